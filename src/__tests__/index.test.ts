import { By, PageObjectDefinition, PageObjectFactory, WebElement } from '../index.js';
import { createMockElement, createMockSearchContext } from './utils/pageObjectMocks.js';

class LoginPage {
  static readonly elements = new PageObjectDefinition<LoginPage>()
    .element('username', By.id('username'))
    .element('submit', By.css('button[type="submit"]'));

  username!: WebElement;
  submit!: WebElement;
}

describe('package entry', () => {
  test('binds a page object end to end', async () => {
    const fill = jest.fn().mockResolvedValue(undefined);
    const click = jest.fn().mockResolvedValue(undefined);
    const { context } = createMockSearchContext({
      '#username': [createMockElement({ fill })],
      'button[type="submit"]': [createMockElement({ click })]
    });

    const page = PageObjectFactory.forContext(context).initElements(new LoginPage());
    await page.username.fill('test-user');
    await page.submit.click();

    expect(fill).toHaveBeenCalledWith('test-user');
    expect(click).toHaveBeenCalledTimes(1);
  });
});
