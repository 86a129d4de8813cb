/**
 * View Tests
 *
 * Page rendering, partials and the template-side partial tag.
 */

import { fileURLToPath } from 'node:url';
import { expect, test } from 'vitest';
import { Config } from '../../framework/config/config.ts';
import { Logger, type LogEntry } from '../../framework/telemetry/logger.ts';
import {
  InvalidCollectionError,
  InvalidTemplateNameError,
  TemplateNotFoundError,
} from '../../framework/view/errors.ts';
import { locals, value } from '../../framework/view/partial.ts';
import { TemplateEngine } from '../../framework/view/template.ts';
import { View } from '../../framework/view/view.ts';

const FIXTURE_VIEWS = fileURLToPath(new URL('../fixtures/views', import.meta.url));

function createView(templates: Record<string, string>, options: { naming?: 'direct' | 'underscore-prefixed' } = {}) {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level: 'debug', output: (entry) => entries.push(entry) });
  const engine = new TemplateEngine({ defaultLayout: 'layout' });

  for (const [id, source] of Object.entries(templates)) {
    engine.registerTemplate(id, source);
  }

  const view = new View({ engine, logger, naming: options.naming });
  return { view, engine, entries };
}

// partial

test('View.partial - binds a single value under the partial name', () => {
  const { view } = createView({ _greeting: '<p>{{ greeting }}</p>' });
  expect(view.partial('greeting', value('Hello'))).toBe('<p>Hello</p>');
});

test('View.partial - passes explicit locals', () => {
  const { view } = createView({ _header: '<h1>{{ title }}</h1>' });
  expect(view.partial('header', locals({ title: 'Hi' }))).toBe('<h1>Hi</h1>');
});

test('View.partial - never applies the layout', () => {
  const { view } = createView({
    layout: '<main>{% yield %}</main>',
    _header: '<h1>{{ title }}</h1>',
  });

  expect(view.partial('header', locals({ title: 'Hi' }))).toBe('<h1>Hi</h1>');
  expect(view.partial('header', locals({ title: 'Hi' }), { layout: 'layout' })).toBe('<h1>Hi</h1>');
});

test('View.partial - direct naming looks up the plain id', () => {
  const { view } = createView({ header: 'plain', _header: 'prefixed' }, { naming: 'direct' });
  expect(view.partial('header')).toBe('plain');
});

test('View.partial - nested names prefix the last segment', () => {
  const { view } = createView({ 'users/_row': '<tr>{{ row.name }}</tr>' });
  expect(view.partial('users/row', value({ name: 'ada' }))).toBe('<tr>ada</tr>');
});

test('View.partial - missing template error propagates unchanged', () => {
  const { view } = createView({});

  let caught: unknown;
  try {
    view.partial('missing');
  } catch (error) {
    caught = error;
  }

  expect(caught).toBeInstanceOf(TemplateNotFoundError);
  if (caught instanceof TemplateNotFoundError) {
    expect(caught.templateId).toBe('_missing');
  }
});

test('View.partial - invalid name throws before rendering', () => {
  const { view } = createView({});
  expect(() => view.partial('')).toThrow(InvalidTemplateNameError);
});

test('View.partial - logs each render at debug', () => {
  const { view, entries } = createView({ _greeting: '{{ greeting }}' });
  view.partial('greeting', value('Hello'));

  expect(entries).toHaveLength(1);
  expect(entries[0].level).toBe('debug');
  expect(entries[0].message).toBe('Rendering partial');
  expect(entries[0].context).toEqual({ component: 'view', partial: 'greeting', template: '_greeting' });
});

// collection

test('View.collection - renders members in order joined by newlines', () => {
  const { view } = createView({ _item: '<li>{{ item }}</li>' });
  expect(view.collection('item', { collection: [1, 2, 3] })).toBe('<li>1</li>\n<li>2</li>\n<li>3</li>');
});

test('View.collection - empty collection renders nothing', () => {
  const { view } = createView({ _item: '<li>{{ item }}</li>' });
  expect(view.collection('item', { collection: [] })).toBe('');
});

test('View.collection - shares locals across members', () => {
  const { view } = createView({ _row: '{{ prefix }}{{ row }}' });
  expect(view.collection('row', { collection: ['a', 'b'], locals: { prefix: '-' } })).toBe('-a\n-b');
});

test('View.collection - logs the collection size', () => {
  const { view, entries } = createView({ _item: '{{ item }}' });
  view.collection('item', { collection: ['a', 'b'] });

  expect(entries[0].message).toBe('Rendering partial collection');
  expect(entries[0].context).toEqual({ component: 'view', partial: 'item', size: 2 });
});

// render

test('View.render - wraps pages in the default layout', () => {
  const { view } = createView({ layout: '<main>{% yield %}</main>', index: 'Body' });
  expect(view.render('index')).toBe('<main>Body</main>');
  expect(view.render('index', {}, { layout: false })).toBe('Body');
});

test('View.render - partial tags render through the resolver', () => {
  const { view } = createView({
    index: '{% partial "header" with title %}|{% partial "item" for items %}',
    _header: '<h1>{{ header }}</h1>',
    _item: '<li>{{ item }}</li>',
  });

  expect(view.render('index', { title: 'Hi', items: ['a', 'b'] })).toBe('<h1>Hi</h1>|<li>a</li>\n<li>b</li>');
});

test('View.render - partial output is not escaped twice', () => {
  const { view } = createView({
    index: '{% partial "header" with title %}',
    _header: '<h1>{{ header }}</h1>',
  });

  expect(view.render('index', { title: '<x>' })).toBe('<h1>&lt;x&gt;</h1>');
});

test('View.render - partial tags inside the layout and nested partials', () => {
  const { view } = createView({
    layout: '{% partial "nav" with user=user %}<main>{% yield %}</main>',
    index: '{% partial "list" with items=items %}',
    _nav: '<nav>{{ user }}</nav>',
    _list: '<ul>{% partial "entry" for items with sep="-" %}</ul>',
    _entry: '{{ sep }}{{ entry }}',
  });

  expect(view.render('index', { user: 'ada', items: ['x', 'y'] })).toBe(
    '<nav>ada</nav><main><ul>-x\n-y</ul></main>'
  );
});

test('View.render - partial tag with a non-collection raises InvalidCollectionError', () => {
  const { view } = createView({ index: '{% partial "item" for title %}', _item: '' });
  expect(() => view.render('index', { title: 'abc' })).toThrow(InvalidCollectionError);
});

// helpers

test('View.helpers - exposes bound partial helpers', () => {
  const { view } = createView({ _greeting: '<p>{{ greeting }}</p>', _n: '{{ n }}' });
  const { partial, collection } = view.helpers();

  expect(partial('greeting', value('Yo'))).toBe('<p>Yo</p>');
  expect(collection('n', { collection: [1, 2] })).toBe('1\n2');
});

// configuration

test('View.fromConfig - uses naming and layout settings', () => {
  const logger = new Logger({ level: 'error', output: () => {} });
  const view = View.fromConfig(new Config({ views: { naming: 'direct', layout: 'base' } }), logger);

  view.engine.registerTemplate('base', '[{% yield %}]');
  view.engine.registerTemplate('page', 'p');
  view.engine.registerTemplate('card', 'c');

  expect(view.resolver.naming).toBe('direct');
  expect(view.render('page')).toBe('[p]');
  expect(view.partial('card')).toBe('c');
});

test('View.fromConfig - layout false renders bare pages', () => {
  const logger = new Logger({ level: 'error', output: () => {} });
  const view = View.fromConfig(new Config({ views: { layout: false } }), logger);

  view.engine.registerTemplate('layout', '[{% yield %}]');
  view.engine.registerTemplate('page', 'p');

  expect(view.render('page')).toBe('p');
});

test('View.load - loads templates from the configured directory', async () => {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level: 'info', output: (entry) => entries.push(entry) });
  const view = View.fromConfig(new Config({ views: { path: FIXTURE_VIEWS } }), logger);

  expect(await view.load()).toEqual(['layout', 'page', 'shared/_card']);
  expect(view.partial('shared/card', locals({ title: 'T' }))).toBe('<div class="card">T</div>');
  expect(view.render('page', { message: 'Hi' })).toBe('<main><p>Hi</p></main>');
  expect(entries.map((e) => [e.message, e.context])).toEqual([
    ['Templates loaded', { component: 'view', count: 3 }],
  ]);
});
