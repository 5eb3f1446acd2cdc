import { By } from './by.js';
import { ElementNotFoundError } from './errors.js';
import { ElementLocator, SearchContext, WebElement } from './types.js';
import logger from '../../utils/logger.js';

/**
 * Resolves criteria against a search context. No caching and no retry:
 * staleness and missing elements are the proxies' business.
 */
export class DefaultElementLocator implements ElementLocator {
  constructor(readonly searchContext: SearchContext) {}

  async locateElement(bys: readonly By[]): Promise<WebElement> {
    for (const by of bys) {
      const element = await this.searchContext.$(by.toSelector());
      if (element) {
        logger.debug('Located element', { by: by.toString() });
        return element;
      }
    }

    throw new ElementNotFoundError(bys);
  }

  async locateElements(bys: readonly By[]): Promise<WebElement[]> {
    const collection: WebElement[] = [];
    for (const by of bys) {
      const elements = await this.searchContext.$$(by.toSelector());
      collection.push(...elements);
    }

    logger.debug('Located elements', {
      criteria: bys.map((by) => by.toString()),
      count: collection.length
    });
    return collection;
  }
}
