import { By } from '../by.js';
import { ElementList, ElementLocator, WebElement } from '../types.js';
import { WebElementProxy } from './WebElementProxy.js';

/**
 * Multi-element declaration. Nothing is cached between accesses, so row
 * counts that change between reads are always reflected; each element
 * handed out is its own WebElementProxy and recovers from staleness on
 * its own.
 */
export class ElementListProxy<T = WebElement> implements ElementList<T> {
  private readonly bys: readonly By[];

  constructor(
    private readonly locator: ElementLocator,
    bys: readonly By[],
    private readonly project: (element: WebElementProxy) => T
  ) {
    this.bys = [...bys];
  }

  static of(locator: ElementLocator, bys: readonly By[]): ElementListProxy<WebElement> {
    return new ElementListProxy<WebElement>(locator, bys, (element) => element);
  }

  async all(): Promise<T[]> {
    const elements = await this.locator.locateElements(this.bys);
    return elements.map((element, index) => this.wrap(element, index));
  }

  async count(): Promise<number> {
    const elements = await this.locator.locateElements(this.bys);
    return elements.length;
  }

  async at(index: number): Promise<T | undefined> {
    const elements = await this.locator.locateElements(this.bys);
    const element = elements[index];
    return element ? this.wrap(element, index) : undefined;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    yield* await this.all();
  }

  private wrap(element: WebElement, index: number): T {
    return this.project(new WebElementProxy(this.locator, this.bys, { index, element }));
  }
}
