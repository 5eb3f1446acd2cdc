import { ElementActivator, WebElement, WrapperType, WrapsElement } from './types.js';

/**
 * Constructs wrappers by calling their constructor with the element.
 */
export class DefaultElementActivator implements ElementActivator {
  create<W extends WrapsElement>(type: WrapperType<W>, element: WebElement): W {
    return new type(element);
  }
}

/**
 * Convenience base for wrapper types.
 */
export abstract class ElementWrapper implements WrapsElement {
  constructor(public wrappedElement: WebElement) {}

  click(): Promise<void> {
    return this.wrappedElement.click();
  }

  async text(): Promise<string> {
    return (await this.wrappedElement.textContent()) ?? '';
  }
}
