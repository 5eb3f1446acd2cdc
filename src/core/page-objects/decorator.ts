import { By } from './by.js';
import { definitionOf, isWritableMember } from './definition.js';
import { UnsupportedMemberTypeError } from './errors.js';
import { DefaultElementLocator } from './locator.js';
import { ElementListProxy } from './proxies/ElementListProxy.js';
import { WebElementProxy } from './proxies/WebElementProxy.js';
import {
  DecoratedMember,
  ElementActivator,
  ElementLocator,
  MemberDecorator,
  PageObjectMembers,
  WebElement,
  WrapperType,
  WrapsElement,
  MemberShape
} from './types.js';
import logger from '../../utils/logger.js';

/**
 * Decorates nested page objects; implemented by PageObjectFactory.
 */
export interface PageObjectInitializer {
  initElementsWith<T extends object>(page: T, definition: PageObjectMembers | undefined, locator: ElementLocator): T;
}

function describeShape(shape: unknown): string {
  if (typeof shape === 'object' && shape !== null && 'kind' in shape) {
    return `member of kind ${String(shape.kind)}`;
  }
  return String(shape);
}

/**
 * Member decorator that hands out lazy proxies, so nothing touches the page
 * until a member is used.
 */
export class ProxyMemberDecorator implements MemberDecorator {
  constructor(
    private readonly activator: ElementActivator,
    private readonly initializer: PageObjectInitializer
  ) {}

  decorate(shape: MemberShape, bys: readonly By[], locator: ElementLocator): DecoratedMember {
    switch (shape.kind) {
      case 'element':
        return new WebElementProxy(locator, bys);
      case 'wrapper':
        return this.createAndPopulateWrapper(shape.type, new WebElementProxy(locator, bys));
      case 'elementList':
        return ElementListProxy.of(locator, bys);
      case 'wrapperList': {
        const type = shape.type;
        return new ElementListProxy(locator, bys, (element) => this.createAndPopulateWrapper(type, element));
      }
      default: {
        const unsupported: never = shape;
        throw new UnsupportedMemberTypeError(unsupported, describeShape(unsupported));
      }
    }
  }

  private createAndPopulateWrapper<W extends WrapsElement>(type: WrapperType<W>, element: WebElement): W {
    const wrapper = this.activator.create(type, element);
    if (isWritableMember(wrapper, 'wrappedElement')) {
      wrapper.wrappedElement = element;
    }

    // The activator may hand back a subtype with declarations of its own
    const definition = definitionOf(wrapper) ?? type.elements;
    logger.debug('Populating wrapper', { type: type.name, element: String(element) });
    return this.initializer.initElementsWith(wrapper, definition, new DefaultElementLocator(element));
  }
}
