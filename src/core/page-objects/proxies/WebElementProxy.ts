import { ElementHandle } from 'playwright-core';
import { By, describeBys } from '../by.js';
import { ElementNotFoundError, isStaleElementError, StaleElementReferenceError } from '../errors.js';
import { ElementCapability, ElementLocator, WebElement } from '../types.js';
import logger from '../../../utils/logger.js';

type Args<K extends ElementCapability> = Parameters<ElementHandle[K]>;
type Result<K extends ElementCapability> = ReturnType<ElementHandle[K]>;

function canEvaluate(element: WebElement): element is WebElement & Pick<ElementHandle, 'evaluate'> {
  return typeof Reflect.get(element, 'evaluate') === 'function';
}

// Playwright searches under a detached root without complaint
async function assertConnected(element: WebElement): Promise<void> {
  if (canEvaluate(element) && !(await element.evaluate((node) => node.isConnected))) {
    throw new StaleElementReferenceError();
  }
}

export interface WebElementProxyOptions {
  /** Position within a multi-element declaration; re-resolution picks this index again. */
  index?: number;
  /** Handle already found while enumerating, used until it goes stale. */
  element?: WebElement;
}

/**
 * Stands in for an element that has not been looked up yet.
 *
 * The first operation resolves the element through the locator and caches
 * it. The cache is never re-validated up front; when an operation reports
 * the handle as stale the proxy re-resolves once and repeats the operation
 * once. A second stale report within the same operation is thrown as-is.
 */
export class WebElementProxy implements WebElement {
  private element: WebElement | null;
  private pending: Promise<WebElement> | null = null;
  private readonly bys: readonly By[];
  private readonly index?: number;

  constructor(private readonly locator: ElementLocator, bys: readonly By[], options: WebElementProxyOptions = {}) {
    if (bys.length === 0) {
      throw new TypeError('An element proxy needs at least one criterion');
    }
    this.bys = [...bys];
    this.index = options.index;
    this.element = options.element ?? null;
  }

  /** Resolves (if needed) and returns the underlying handle. */
  getWrappedElement(): Promise<WebElement> {
    return this.resolve();
  }

  toString(): string {
    const position = this.index === undefined ? '' : `[${this.index}]`;
    return `WebElementProxy(${describeBys(this.bys)})${position}`;
  }

  private resolve(): Promise<WebElement> {
    if (this.element) {
      return Promise.resolve(this.element);
    }

    // Concurrent callers share one lookup
    if (!this.pending) {
      this.pending = this.locate()
        .then((element) => {
          this.element = element;
          logger.element.resolved(this.toString());
          return element;
        })
        .finally(() => {
          this.pending = null;
        });
    }
    return this.pending;
  }

  private async locate(): Promise<WebElement> {
    if (this.index === undefined) {
      return this.locator.locateElement(this.bys);
    }

    const elements = await this.locator.locateElements(this.bys);
    const element = elements[this.index];
    if (!element) {
      throw new ElementNotFoundError(
        this.bys,
        `Could not find element ${this.index} by: ${describeBys(this.bys)} (found ${elements.length})`
      );
    }
    return element;
  }

  private invalidate(stale: WebElement): void {
    // Another caller may already have replaced it
    if (this.element === stale) {
      this.element = null;
    }
  }

  protected async invoke<R>(operation: string, action: (element: WebElement) => Promise<R>): Promise<R> {
    const element = await this.resolve();
    try {
      return await action(element);
    } catch (error) {
      if (!isStaleElementError(error)) {
        throw error;
      }

      logger.element.retry(this.toString(), { operation });
      this.invalidate(element);
      const fresh = await this.resolve();
      return action(fresh);
    }
  }

  $(selector: string): Promise<ElementHandle<SVGElement | HTMLElement> | null> {
    return this.invoke('$', async (element) => {
      await assertConnected(element);
      return element.$(selector);
    });
  }

  $$(selector: string): Promise<ElementHandle<SVGElement | HTMLElement>[]> {
    return this.invoke('$$', async (element) => {
      await assertConnected(element);
      return element.$$(selector);
    });
  }

  boundingBox(): Result<'boundingBox'> {
    return this.invoke('boundingBox', (element) => element.boundingBox());
  }

  check(...args: Args<'check'>): Promise<void> {
    return this.invoke('check', (element) => element.check(...args));
  }

  click(...args: Args<'click'>): Promise<void> {
    return this.invoke('click', (element) => element.click(...args));
  }

  dblclick(...args: Args<'dblclick'>): Promise<void> {
    return this.invoke('dblclick', (element) => element.dblclick(...args));
  }

  dispatchEvent(...args: Args<'dispatchEvent'>): Promise<void> {
    return this.invoke('dispatchEvent', (element) => element.dispatchEvent(...args));
  }

  fill(...args: Args<'fill'>): Promise<void> {
    return this.invoke('fill', (element) => element.fill(...args));
  }

  focus(): Promise<void> {
    return this.invoke('focus', (element) => element.focus());
  }

  getAttribute(...args: Args<'getAttribute'>): Promise<string | null> {
    return this.invoke('getAttribute', (element) => element.getAttribute(...args));
  }

  hover(...args: Args<'hover'>): Promise<void> {
    return this.invoke('hover', (element) => element.hover(...args));
  }

  innerHTML(): Promise<string> {
    return this.invoke('innerHTML', (element) => element.innerHTML());
  }

  innerText(): Promise<string> {
    return this.invoke('innerText', (element) => element.innerText());
  }

  inputValue(...args: Args<'inputValue'>): Promise<string> {
    return this.invoke('inputValue', (element) => element.inputValue(...args));
  }

  isChecked(): Promise<boolean> {
    return this.invoke('isChecked', (element) => element.isChecked());
  }

  isDisabled(): Promise<boolean> {
    return this.invoke('isDisabled', (element) => element.isDisabled());
  }

  isEditable(): Promise<boolean> {
    return this.invoke('isEditable', (element) => element.isEditable());
  }

  isEnabled(): Promise<boolean> {
    return this.invoke('isEnabled', (element) => element.isEnabled());
  }

  isHidden(): Promise<boolean> {
    return this.invoke('isHidden', (element) => element.isHidden());
  }

  isVisible(): Promise<boolean> {
    return this.invoke('isVisible', (element) => element.isVisible());
  }

  press(...args: Args<'press'>): Promise<void> {
    return this.invoke('press', (element) => element.press(...args));
  }

  screenshot(...args: Args<'screenshot'>): Result<'screenshot'> {
    return this.invoke('screenshot', (element) => element.screenshot(...args));
  }

  scrollIntoViewIfNeeded(...args: Args<'scrollIntoViewIfNeeded'>): Promise<void> {
    return this.invoke('scrollIntoViewIfNeeded', (element) => element.scrollIntoViewIfNeeded(...args));
  }

  selectOption(...args: Args<'selectOption'>): Promise<string[]> {
    return this.invoke('selectOption', (element) => element.selectOption(...args));
  }

  selectText(...args: Args<'selectText'>): Promise<void> {
    return this.invoke('selectText', (element) => element.selectText(...args));
  }

  setChecked(...args: Args<'setChecked'>): Promise<void> {
    return this.invoke('setChecked', (element) => element.setChecked(...args));
  }

  setInputFiles(...args: Args<'setInputFiles'>): Promise<void> {
    return this.invoke('setInputFiles', (element) => element.setInputFiles(...args));
  }

  tap(...args: Args<'tap'>): Promise<void> {
    return this.invoke('tap', (element) => element.tap(...args));
  }

  textContent(): Promise<string | null> {
    return this.invoke('textContent', (element) => element.textContent());
  }

  type(...args: Args<'type'>): Promise<void> {
    return this.invoke('type', (element) => element.type(...args));
  }

  uncheck(...args: Args<'uncheck'>): Promise<void> {
    return this.invoke('uncheck', (element) => element.uncheck(...args));
  }

  waitForElementState(...args: Args<'waitForElementState'>): Promise<void> {
    return this.invoke('waitForElementState', (element) => element.waitForElementState(...args));
  }
}
