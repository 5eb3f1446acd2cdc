import { By } from './by.js';
import {
  ElementList,
  MemberDeclaration,
  MemberShape,
  PageObjectMembers,
  WebElement,
  WrapperType,
  WrapsElement
} from './types.js';

/** Names of the members of T whose declared type is V. */
export type KeysOfType<T, V> = {
  [K in keyof T]-?: NonNullable<T[K]> extends V ? K : never;
}[keyof T] & string;

/**
 * Explicit list of a page object's element members, built once per class:
 *
 * ```ts
 * class LoginPage {
 *   static readonly elements = new PageObjectDefinition<LoginPage>()
 *     .element('username', By.id('username'), By.name('user'))
 *     .elementList('errors', By.className('error'));
 *
 *   username!: WebElement;
 *   errors!: ElementList;
 * }
 * ```
 */
export class PageObjectDefinition<T extends object> implements PageObjectMembers {
  private readonly declarations: MemberDeclaration[];

  constructor(declarations: readonly MemberDeclaration[] = []) {
    this.declarations = [...declarations];
  }

  /** Starts from the declarations of a base page object. */
  static inherit<T extends object>(base: PageObjectMembers): PageObjectDefinition<T> {
    return new PageObjectDefinition<T>(base.members);
  }

  get members(): readonly MemberDeclaration[] {
    return this.declarations;
  }

  element(member: KeysOfType<T, WebElement>, ...bys: By[]): this {
    return this.declare(member, { kind: 'element' }, bys);
  }

  wrapper<W extends WrapsElement>(member: KeysOfType<T, W>, type: WrapperType<W>, ...bys: By[]): this {
    return this.declare(member, { kind: 'wrapper', type }, bys);
  }

  elementList(member: KeysOfType<T, ElementList<WebElement>>, ...bys: By[]): this {
    return this.declare(member, { kind: 'elementList' }, bys);
  }

  wrapperList<W extends WrapsElement>(member: KeysOfType<T, ElementList<W>>, type: WrapperType<W>, ...bys: By[]): this {
    return this.declare(member, { kind: 'wrapperList', type }, bys);
  }

  private declare(member: string, shape: MemberShape, bys: By[]): this {
    // A later declaration of the same member replaces the inherited one
    const existing = this.declarations.findIndex((declaration) => declaration.member === member);
    const declaration: MemberDeclaration = { member, shape, bys };
    if (existing >= 0) {
      this.declarations[existing] = declaration;
    } else {
      this.declarations.push(declaration);
    }
    return this;
  }
}

function isPageObjectMembers(value: unknown): value is PageObjectMembers {
  return value instanceof PageObjectDefinition
    || (typeof value === 'object' && value !== null && Array.isArray(Reflect.get(value, 'members')));
}

/**
 * Reads the static `elements` definition of the page's class.
 */
export function definitionOf(page: object): PageObjectMembers | undefined {
  const type: unknown = Reflect.get(page, 'constructor');
  if (typeof type !== 'function') {
    return undefined;
  }
  const elements: unknown = Reflect.get(type, 'elements');
  return isPageObjectMembers(elements) ? elements : undefined;
}

export function typeNameOf(page: object): string {
  const type: unknown = Reflect.get(page, 'constructor');
  return typeof type === 'function' && type.name ? type.name : 'Object';
}

/**
 * Whether assigning `member` on `target` would take effect: a writable data
 * property or a setter somewhere on the prototype chain, or a new property
 * on an extensible object.
 */
export function isWritableMember(target: object, member: string): boolean {
  let current: object | null = target;
  while (current) {
    const descriptor = Object.getOwnPropertyDescriptor(current, member);
    if (descriptor) {
      if (descriptor.get || descriptor.set) {
        return descriptor.set !== undefined;
      }
      // Inherited data properties are shadowed by a new own property
      return descriptor.writable === true && (current === target || Object.isExtensible(target));
    }
    current = Object.getPrototypeOf(current);
  }
  return Object.isExtensible(target);
}
