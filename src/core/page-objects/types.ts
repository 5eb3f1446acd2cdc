import { ElementHandle } from 'playwright-core';
import { By } from './by.js';

/**
 * Anything elements can be looked up in: a Page, a Frame, an ElementHandle,
 * or an element proxy.
 */
export interface SearchContext {
  $(selector: string): Promise<ElementHandle<SVGElement | HTMLElement> | null>;
  $$(selector: string): Promise<ElementHandle<SVGElement | HTMLElement>[]>;
}

/**
 * Element handle operations a page object exercises.
 */
export type ElementCapability =
  | 'boundingBox'
  | 'check'
  | 'click'
  | 'dblclick'
  | 'dispatchEvent'
  | 'fill'
  | 'focus'
  | 'getAttribute'
  | 'hover'
  | 'innerHTML'
  | 'innerText'
  | 'inputValue'
  | 'isChecked'
  | 'isDisabled'
  | 'isEditable'
  | 'isEnabled'
  | 'isHidden'
  | 'isVisible'
  | 'press'
  | 'screenshot'
  | 'scrollIntoViewIfNeeded'
  | 'selectOption'
  | 'selectText'
  | 'setChecked'
  | 'setInputFiles'
  | 'tap'
  | 'textContent'
  | 'type'
  | 'uncheck'
  | 'waitForElementState';

/**
 * A live element. Playwright's ElementHandle satisfies this as-is.
 */
export interface WebElement extends Pick<ElementHandle, ElementCapability>, SearchContext {}

/**
 * User-defined type that embeds exactly one element and is itself a page object.
 */
export interface WrapsElement {
  wrappedElement: WebElement;
}

export interface MemberDeclaration {
  readonly member: string;
  readonly shape: MemberShape;
  readonly bys: readonly By[];
}

/**
 * The declarations of one page-object type.
 */
export interface PageObjectMembers {
  readonly members: readonly MemberDeclaration[];
}

export interface WrapperType<W extends WrapsElement = WrapsElement> {
  new (element: WebElement): W;
  readonly elements?: PageObjectMembers;
}

/**
 * Lazy sequence over the elements currently matching a declaration.
 * Every access queries the page again.
 */
export interface ElementList<T = WebElement> extends AsyncIterable<T> {
  all(): Promise<T[]>;
  count(): Promise<number>;
  at(index: number): Promise<T | undefined>;
}

export type MemberShape =
  | { readonly kind: 'element' }
  | { readonly kind: 'wrapper'; readonly type: WrapperType }
  | { readonly kind: 'elementList' }
  | { readonly kind: 'wrapperList'; readonly type: WrapperType };

export type DecoratedMember = WebElement | WrapsElement | ElementList<WebElement> | ElementList<WrapsElement>;

export interface ElementLocator {
  /** First criterion, in order, that matches. */
  locateElement(bys: readonly By[]): Promise<WebElement>;
  /** Union of the matches of every criterion, in criteria order. */
  locateElements(bys: readonly By[]): Promise<WebElement[]>;
}

export interface ElementActivator {
  create<W extends WrapsElement>(type: WrapperType<W>, element: WebElement): W;
}

export interface MemberDecorator {
  decorate(shape: MemberShape, bys: readonly By[], locator: ElementLocator): DecoratedMember | undefined;
}
