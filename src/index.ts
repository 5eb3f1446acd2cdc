export { By, distinctBys, FindsBySchema, HOW_VALUES } from './core/page-objects/by.js';
export type { FindsBy, How } from './core/page-objects/by.js';
export {
  PageObjectError,
  ElementNotFoundError,
  StaleElementReferenceError,
  UnsupportedMemberTypeError,
  MemberNotWritableError,
  InvalidCriterionError,
  isStaleElementError
} from './core/page-objects/errors.js';
export { DefaultElementLocator } from './core/page-objects/locator.js';
export { WebElementProxy } from './core/page-objects/proxies/WebElementProxy.js';
export type { WebElementProxyOptions } from './core/page-objects/proxies/WebElementProxy.js';
export { ElementListProxy } from './core/page-objects/proxies/ElementListProxy.js';
export { DefaultElementActivator, ElementWrapper } from './core/page-objects/activator.js';
export { PageObjectDefinition, definitionOf, isWritableMember } from './core/page-objects/definition.js';
export type { KeysOfType } from './core/page-objects/definition.js';
export { ProxyMemberDecorator } from './core/page-objects/decorator.js';
export type { PageObjectInitializer } from './core/page-objects/decorator.js';
export { PageObjectFactory } from './core/page-objects/factory.js';
export type {
  SearchContext,
  ElementCapability,
  WebElement,
  WrapsElement,
  WrapperType,
  ElementList,
  MemberShape,
  MemberDeclaration,
  PageObjectMembers,
  DecoratedMember,
  ElementLocator,
  ElementActivator,
  MemberDecorator
} from './core/page-objects/types.js';
export { default as logger, createLogger } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
export { config, loadConfig } from './config.js';
export type { PageObjectsConfig } from './config.js';
