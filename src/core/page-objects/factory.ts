import { distinctBys } from './by.js';
import { DefaultElementActivator } from './activator.js';
import { ProxyMemberDecorator, PageObjectInitializer } from './decorator.js';
import { definitionOf, isWritableMember, typeNameOf } from './definition.js';
import { MemberNotWritableError } from './errors.js';
import { DefaultElementLocator } from './locator.js';
import {
  ElementActivator,
  ElementLocator,
  MemberDecorator,
  PageObjectMembers,
  SearchContext
} from './types.js';
import logger from '../../utils/logger.js';

/**
 * Populates the declared element members of page objects.
 */
export class PageObjectFactory implements PageObjectInitializer {
  private readonly memberDecorator: MemberDecorator;

  /**
   * @param elementLocator locator the top-level members resolve through
   * @param memberDecorator defaults to proxy decoration with `activator`
   */
  constructor(
    private readonly elementLocator: ElementLocator,
    memberDecorator?: MemberDecorator,
    activator: ElementActivator = new DefaultElementActivator()
  ) {
    this.memberDecorator = memberDecorator ?? new ProxyMemberDecorator(activator, this);
  }

  /** Factory for a Page, Frame or element handle. */
  static forContext(searchContext: SearchContext, activator?: ElementActivator): PageObjectFactory {
    return new PageObjectFactory(new DefaultElementLocator(searchContext), undefined, activator);
  }

  /**
   * Decorates every declared member of `page`. Without an explicit
   * definition, the static `elements` of the page's class is used.
   */
  initElements<T extends object>(page: T, definition?: PageObjectMembers): T {
    return this.initElementsWith(page, definition, this.elementLocator);
  }

  initElementsWith<T extends object>(page: T, definition: PageObjectMembers | undefined, locator: ElementLocator): T {
    const members = (definition ?? definitionOf(page))?.members ?? [];
    const owner = typeNameOf(page);

    logger.debug('Decorating page object', { type: owner, members: members.length });

    for (const declaration of members) {
      const bys = distinctBys(declaration.bys);
      if (bys.length === 0) {
        continue;
      }

      if (!isWritableMember(page, declaration.member)) {
        throw new MemberNotWritableError(owner, declaration.member);
      }

      const value = this.memberDecorator.decorate(declaration.shape, bys, locator);
      if (value !== undefined) {
        Reflect.set(page, declaration.member, value);
      }
    }

    return page;
  }
}
