import { By, describeBys } from './by.js';

/**
 * Base class for everything this library throws. `code` is stable and
 * meant for programmatic checks; messages are for humans.
 */
export class PageObjectError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'PageObjectError';
    this.code = code;
  }
}

export class ElementNotFoundError extends PageObjectError {
  readonly criteria: readonly By[];

  constructor(criteria: readonly By[], message?: string) {
    super(
      'ELEMENT_NOT_FOUND',
      message ?? `Could not find element by: ${describeBys(criteria)}`
    );
    this.name = 'ElementNotFoundError';
    this.criteria = criteria;
  }
}

export class StaleElementReferenceError extends PageObjectError {
  constructor(message = 'Element is no longer attached to the page') {
    super('STALE_ELEMENT_REFERENCE', message);
    this.name = 'StaleElementReferenceError';
  }
}

export class UnsupportedMemberTypeError extends PageObjectError {
  readonly shape: unknown;

  constructor(shape: unknown, description: string) {
    super('UNSUPPORTED_MEMBER_TYPE', `Unable to decorate ${description}, it is unsupported`);
    this.name = 'UnsupportedMemberTypeError';
    this.shape = shape;
  }
}

export class MemberNotWritableError extends PageObjectError {
  readonly member: string;

  constructor(owner: string, member: string) {
    super('MEMBER_NOT_WRITABLE', `Unable to decorate ${owner}.${member}, it cannot be written to`);
    this.name = 'MemberNotWritableError';
    this.member = member;
  }
}

function declaredField(declaration: unknown, key: string): string {
  if (typeof declaration === 'object' && declaration !== null && key in declaration) {
    return String(Reflect.get(declaration, key));
  }
  return 'undefined';
}

export class InvalidCriterionError extends PageObjectError {
  readonly declaration: unknown;

  constructor(declaration: unknown) {
    super(
      'INVALID_CRITERION',
      `Did not know how to construct a criterion from how ${declaredField(declaration, 'how')}, using ${declaredField(declaration, 'using')}`
    );
    this.name = 'InvalidCriterionError';
    this.declaration = declaration;
  }
}

// Messages Playwright uses when a handle outlives its DOM node or frame
const STALE_MESSAGE_PATTERNS = [
  /not attached to the DOM/i,
  /Element is detached/i,
  /JSHandle is disposed/i,
  /Execution context was destroyed/i,
  /Cannot find context with specified id/i,
  /stale element/i
];

export function isStaleElementError(error: unknown): boolean {
  if (error instanceof StaleElementReferenceError) {
    return true;
  }
  if (error instanceof Error) {
    return STALE_MESSAGE_PATTERNS.some((pattern) => pattern.test(error.message));
  }
  return false;
}
