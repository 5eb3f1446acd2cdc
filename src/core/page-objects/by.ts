import cssesc from 'cssesc';
import { z } from 'zod';
import { InvalidCriterionError } from './errors.js';

export const HOW_VALUES = [
  'id',
  'name',
  'tagName',
  'className',
  'css',
  'linkText',
  'partialLinkText',
  'xpath'
] as const;

export type How = typeof HOW_VALUES[number];

/**
 * Structured "find this element" declaration, as it appears in
 * page-object configuration.
 */
export const FindsBySchema = z.object({
  how: z.enum(HOW_VALUES),
  using: z.string().min(1)
});

export type FindsBy = z.infer<typeof FindsBySchema>;

function quoted(value: string): string {
  return cssesc(value, { quotes: 'double', wrap: true });
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * A single locator criterion. Immutable, compared by value.
 */
export class By {
  private constructor(readonly how: How, readonly using: string) {}

  static id(id: string): By {
    return new By('id', id);
  }

  static name(name: string): By {
    return new By('name', name);
  }

  static tagName(tagName: string): By {
    return new By('tagName', tagName);
  }

  static className(className: string): By {
    return new By('className', className);
  }

  static css(selector: string): By {
    return new By('css', selector);
  }

  static linkText(text: string): By {
    return new By('linkText', text);
  }

  /** Links whose text contains `text`, compared case-sensitively. */
  static partialLinkText(text: string): By {
    return new By('partialLinkText', text);
  }

  static xpath(expression: string): By {
    return new By('xpath', expression);
  }

  /**
   * Builds a criterion from an untyped declaration.
   * @throws InvalidCriterionError when `how` is unknown or `using` is empty
   */
  static from(declaration: unknown): By {
    const result = FindsBySchema.safeParse(declaration);
    if (!result.success) {
      throw new InvalidCriterionError(declaration);
    }
    return new By(result.data.how, result.data.using);
  }

  equals(other: By): boolean {
    return this.how === other.how && this.using === other.using;
  }

  /** Renders the criterion as a Playwright selector. */
  toSelector(): string {
    switch (this.how) {
      case 'id':
        return `#${cssesc(this.using, { isIdentifier: true })}`;
      case 'name':
        return `[name=${quoted(this.using)}]`;
      case 'tagName':
        return cssesc(this.using, { isIdentifier: true });
      case 'className':
        return `.${cssesc(this.using, { isIdentifier: true })}`;
      case 'css':
        return this.using;
      case 'linkText':
        return `a:text-is(${quoted(this.using)})`;
      case 'partialLinkText':
        return `a:text-matches(${quoted(escapeRegExp(this.using))})`;
      case 'xpath':
        return `xpath=${this.using}`;
    }
  }

  toString(): string {
    return `By.${this.how}: ${this.using}`;
  }
}

/**
 * Drops repeated criteria, keeping the first occurrence of each.
 */
export function distinctBys(bys: readonly By[]): By[] {
  const result: By[] = [];
  for (const by of bys) {
    if (!result.some((existing) => existing.equals(by))) {
      result.push(by);
    }
  }
  return result;
}

export function describeBys(bys: readonly By[]): string {
  return bys.map((by) => by.toString()).join(', or: ');
}
