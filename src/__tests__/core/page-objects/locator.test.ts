import { DefaultElementLocator } from '../../../core/page-objects/locator.js';
import { By } from '../../../core/page-objects/by.js';
import { ElementNotFoundError } from '../../../core/page-objects/errors.js';
import { createMockElement, createMockSearchContext } from '../../utils/pageObjectMocks.js';

describe('DefaultElementLocator', () => {
  describe('locateElement', () => {
    test('returns the match of the first criterion that finds one', async () => {
      // Arrange
      const byName = createMockElement();
      const byClass = createMockElement();
      const { context, $ } = createMockSearchContext({
        '[name="user"]': [byName],
        '.user': [byClass]
      });
      const locator = new DefaultElementLocator(context);

      // Act
      const element = await locator.locateElement([By.id('user'), By.name('user'), By.className('user')]);

      // Assert
      expect(element).toBe(byName);
      expect($.mock.calls).toEqual([['#user'], ['[name="user"]']]);
    });

    test('throws ElementNotFoundError naming every criterion', async () => {
      const { context } = createMockSearchContext();
      const locator = new DefaultElementLocator(context);
      const bys = [By.id('a'), By.className('b')];

      const attempt = locator.locateElement(bys);

      await expect(attempt).rejects.toBeInstanceOf(ElementNotFoundError);
      await expect(attempt).rejects.toThrow('Could not find element by: By.id: a, or: By.className: b');
    });

    test('propagates search context failures', async () => {
      const failure = new Error('Unexpected token "<" while parsing selector');
      const { context, $ } = createMockSearchContext();
      $.mockRejectedValueOnce(failure);
      const locator = new DefaultElementLocator(context);

      await expect(locator.locateElement([By.css('<'), By.id('a')])).rejects.toBe(failure);
      expect($).toHaveBeenCalledTimes(1);
    });
  });

  describe('locateElements', () => {
    test('returns the union of all criteria in order', async () => {
      const first = createMockElement();
      const second = createMockElement();
      const third = createMockElement();
      const { context, $$ } = createMockSearchContext({
        '#a': [first],
        '.b': [second, third]
      });
      const locator = new DefaultElementLocator(context);

      const elements = await locator.locateElements([By.id('a'), By.className('b')]);

      expect(elements).toEqual([first, second, third]);
      expect(elements[0]).toBe(first);
      expect(elements[2]).toBe(third);
      expect($$).toHaveBeenCalledTimes(2);
    });

    test('returns an empty list when nothing matches', async () => {
      const { context } = createMockSearchContext();
      const locator = new DefaultElementLocator(context);

      await expect(locator.locateElements([By.css('.missing')])).resolves.toEqual([]);
    });
  });
});
