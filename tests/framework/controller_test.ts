/**
 * Controller Tests
 */

import { expect, test } from 'vitest';
import { Controller } from '../../framework/controller/base.ts';
import { Logger } from '../../framework/telemetry/logger.ts';
import { locals, value } from '../../framework/view/partial.ts';
import { TemplateEngine } from '../../framework/view/template.ts';
import { View } from '../../framework/view/view.ts';

class PostsController extends Controller {
  index(): Response {
    return this.render('posts/index', { title: 'Posts' });
  }

  row(): Response {
    return this.renderPartial('posts/row', value('First'));
  }

  rows(): Response {
    return this.renderCollection('posts/row', { collection: ['a', 'b'] });
  }

  invalid(): Response {
    return this.renderPartial('posts/form', locals({ error: 'Title required' }), {}, 422);
  }
}

function createController(): PostsController {
  const engine = new TemplateEngine({ defaultLayout: 'layout' });
  engine.registerTemplate('layout', '<body>{% yield %}</body>');
  engine.registerTemplate('posts/index', '<h1>{{ title }}</h1>');
  engine.registerTemplate('posts/_row', '<li>{{ row }}</li>');
  engine.registerTemplate('posts/_form', '<form>{{ error }}</form>');

  const logger = new Logger({ level: 'error', output: () => {} });
  return new PostsController().setView(new View({ engine, logger }));
}

test('Controller.render - responds with the page in its layout', async () => {
  const response = createController().index();

  expect(response.status).toBe(200);
  expect(response.headers.get('Content-Type')).toBe('text/html; charset=utf-8');
  expect(await response.text()).toBe('<body><h1>Posts</h1></body>');
});

test('Controller.renderPartial - responds with the bare fragment', async () => {
  const response = createController().row();
  expect(await response.text()).toBe('<li>First</li>');
});

test('Controller.renderCollection - responds with one fragment per member', async () => {
  const response = createController().rows();
  expect(await response.text()).toBe('<li>a</li>\n<li>b</li>');
});

test('Controller.renderPartial - uses the given status', async () => {
  const response = createController().invalid();

  expect(response.status).toBe(422);
  expect(await response.text()).toBe('<form>Title required</form>');
});

test('Controller.html - sends raw HTML', async () => {
  const response = createController().html('<p>ok</p>', 201);

  expect(response.status).toBe(201);
  expect(await response.text()).toBe('<p>ok</p>');
});
