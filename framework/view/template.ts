/**
 * Template Engine
 *
 * Small template engine with expression interpolation, control flow,
 * layouts and a `partial` tag.
 *
 * ## Syntax
 *
 * ```html
 * <h1>{{ title|upper }}</h1>
 * {% if user %}Hello {{ user.name }}{% else %}Hello guest{% endif %}
 * {% for post, i in posts %}{{ loop.index1 }}. {{ post.title }}{% endfor %}
 * {% partial "comment" for comments with author=user %}
 * {# comments are dropped #}
 * ```
 *
 * A layout renders the page body where it says `{% yield %}`.
 *
 * Templates are parsed once and cached per id. Rendering is synchronous;
 * only `load()` touches the file system.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join, resolve, sep } from 'node:path';
import { RenderDepthError, TemplateNotFoundError, TemplateSyntaxError } from './errors.ts';
import { escape, SafeHtml } from './html.ts';
import { locals, value, type Locals, type PartialInput } from './partial.ts';

export interface TemplateOptions {
  viewsPath?: string;
  extension?: string;
  cache?: boolean;
  /** Layout applied when a render does not say otherwise, if registered */
  defaultLayout?: string;
  maxDepth?: number;
}

export interface TemplateContext {
  [key: string]: unknown;
}

/**
 * Options understood by `render`
 */
export interface RenderOptions {
  /** `false` for none, a layout id, or `true` for the default layout */
  layout?: boolean | string;
  [key: string]: unknown;
}

/**
 * A `{% partial %}` tag, with its expressions already evaluated
 */
export type PartialCall =
  | { mode: 'single'; name: string; input?: PartialInput }
  | { mode: 'collection'; name: string; collection: unknown; locals: Locals };

export type PartialHandler = (call: PartialCall) => string;

type TemplateNode =
  | { type: 'text'; value: string }
  | { type: 'output'; expression: string }
  | { type: 'if'; branches: ConditionalBranch[] }
  | { type: 'for'; item: string; index: string | null; path: string; body: TemplateNode[] }
  | { type: 'partial'; name: string; collection: string | null; value: string | null; locals: Array<[string, string]> | null }
  | { type: 'yield' };

interface ConditionalBranch {
  condition: string | null;
  body: TemplateNode[];
}

type IfNode = Extract<TemplateNode, { type: 'if' }>;
type ForNode = Extract<TemplateNode, { type: 'for' }>;
type PartialNode = Extract<TemplateNode, { type: 'partial' }>;

type OpenBlock =
  | { tag: 'if'; node: IfNode; body: TemplateNode[] }
  | { tag: 'for'; node: ForNode; body: TemplateNode[] };

interface RenderState {
  templateId: string;
  body?: string;
}

const DEFAULT_OPTIONS: Required<Omit<TemplateOptions, 'defaultLayout'>> = {
  viewsPath: './views',
  extension: '.html',
  cache: true,
  maxDepth: 32,
};

const TOKEN_REGEX = /\{\{\s*([\s\S]+?)\s*\}\}|\{%\s*([\s\S]+?)\s*%\}|\{#[\s\S]*?#\}/g;
const FOR_REGEX = /^for\s+([\w-]+)(?:\s*,\s*([\w-]+))?\s+in\s+(\S+)$/;
const PARTIAL_REGEX = /^partial\s+(['"])(.+?)\1(?:\s+for\s+(\S+))?(?:\s+with\s+([\s\S]+))?$/;
const PATH_REGEX = /^[\w-]+(?:\.[\w-]+)*$/;

/**
 * Template engine
 */
export class TemplateEngine {
  private options: Required<Omit<TemplateOptions, 'defaultLayout'>> & { defaultLayout?: string };
  private sources = new Map<string, string>();
  private cache = new Map<string, TemplateNode[]>();
  private partialHandler: PartialHandler | null = null;
  private depth = 0;

  constructor(options: TemplateOptions = {}) {
    this.options = {
      viewsPath: options.viewsPath ?? DEFAULT_OPTIONS.viewsPath,
      extension: options.extension ?? DEFAULT_OPTIONS.extension,
      cache: options.cache ?? DEFAULT_OPTIONS.cache,
      maxDepth: options.maxDepth ?? DEFAULT_OPTIONS.maxDepth,
      defaultLayout: options.defaultLayout,
    };
  }

  /**
   * Render a registered template, wrapped in its layout
   */
  render(templateId: string, options: RenderOptions = {}, context: TemplateContext = {}): string {
    if (this.depth >= this.options.maxDepth) {
      throw new RenderDepthError(templateId, this.options.maxDepth);
    }

    this.depth++;
    try {
      const body = this.evaluate(this.getTemplate(templateId), context, { templateId });
      const layoutId = this.layoutFor(options.layout);
      if (layoutId === null) {
        return body;
      }

      return this.evaluate(this.getTemplate(layoutId), context, { templateId: layoutId, body });
    } finally {
      this.depth--;
    }
  }

  /**
   * Render a template string directly, without layout
   */
  renderString(source: string, context: TemplateContext = {}): string {
    return this.evaluate(this.parse('<string>', source), context, { templateId: '<string>' });
  }

  /**
   * Register a template source under an id
   */
  registerTemplate(templateId: string, source: string): void {
    this.sources.set(templateId, source);
    this.cache.delete(templateId);
  }

  has(templateId: string): boolean {
    return this.sources.has(templateId);
  }

  /**
   * Install the callback that renders `{% partial %}` tags
   */
  setPartialHandler(handler: PartialHandler | null): void {
    this.partialHandler = handler;
  }

  /**
   * Register every template under the views directory.
   * Ids are paths relative to the directory, without extension.
   */
  async load(): Promise<string[]> {
    const root = resolve(this.options.viewsPath);
    const entries = await readdir(root, { recursive: true });
    const loaded: string[] = [];

    for (const entry of entries.sort()) {
      if (!entry.endsWith(this.options.extension)) continue;

      const templateId = entry.slice(0, -this.options.extension.length).split(sep).join('/');
      this.registerTemplate(templateId, await readFile(join(root, entry), 'utf-8'));
      loaded.push(templateId);
    }

    return loaded;
  }

  private layoutFor(layout: RenderOptions['layout']): string | null {
    if (layout === false) return null;
    if (typeof layout === 'string') return layout;

    const fallback = this.options.defaultLayout;
    return fallback !== undefined && this.sources.has(fallback) ? fallback : null;
  }

  private getTemplate(templateId: string): TemplateNode[] {
    const cached = this.cache.get(templateId);
    if (cached) return cached;

    const source = this.sources.get(templateId);
    if (source === undefined) {
      throw new TemplateNotFoundError(templateId);
    }

    const nodes = this.parse(templateId, source);
    if (this.options.cache) {
      this.cache.set(templateId, nodes);
    }
    return nodes;
  }

  /**
   * Parse template source into a node tree
   */
  private parse(templateId: string, source: string): TemplateNode[] {
    const root: TemplateNode[] = [];
    const stack: OpenBlock[] = [];
    const append = (node: TemplateNode) => (stack.at(-1)?.body ?? root).push(node);

    let lastIndex = 0;
    for (const match of source.matchAll(TOKEN_REGEX)) {
      const index = match.index ?? 0;
      if (index > lastIndex) {
        append({ type: 'text', value: source.slice(lastIndex, index) });
      }
      lastIndex = index + match[0].length;

      const [, expression, tag] = match;
      if (expression !== undefined) {
        append({ type: 'output', expression });
      } else if (tag !== undefined) {
        this.parseTag(templateId, tag, stack, append);
      }
    }

    if (lastIndex < source.length) {
      append({ type: 'text', value: source.slice(lastIndex) });
    }

    const unclosed = stack.at(-1);
    if (unclosed) {
      throw new TemplateSyntaxError(templateId, `unclosed {% ${unclosed.tag} %}`);
    }

    return root;
  }

  private parseTag(
    templateId: string,
    tag: string,
    stack: OpenBlock[],
    append: (node: TemplateNode) => void
  ): void {
    const [keyword] = tag.split(/\s+/, 1);
    const open = stack.at(-1);

    switch (keyword) {
      case 'if': {
        const node: IfNode = {
          type: 'if',
          branches: [{ condition: tag.slice(2).trim(), body: [] }],
        };
        append(node);
        stack.push({ tag: 'if', node, body: node.branches[0].body });
        return;
      }
      case 'elif':
      case 'else': {
        if (open?.tag !== 'if') {
          throw new TemplateSyntaxError(templateId, `{% ${keyword} %} outside of {% if %}`);
        }
        if (open.node.branches.at(-1)?.condition === null) {
          throw new TemplateSyntaxError(templateId, `{% ${keyword} %} after {% else %}`);
        }

        const condition = tag.replace(/^(?:elif|else\s+if|else)\s*/, '');
        const branch: ConditionalBranch = { condition: condition === '' ? null : condition, body: [] };
        open.node.branches.push(branch);
        open.body = branch.body;
        return;
      }
      case 'for': {
        const match = tag.match(FOR_REGEX);
        if (!match) {
          throw new TemplateSyntaxError(templateId, `malformed {% ${tag} %}`);
        }

        const node: ForNode = {
          type: 'for',
          item: match[1],
          index: match[2] ?? null,
          path: match[3],
          body: [],
        };
        append(node);
        stack.push({ tag: 'for', node, body: node.body });
        return;
      }
      case 'endif':
      case 'endfor': {
        const expected = keyword.slice(3);
        if (open?.tag !== expected) {
          throw new TemplateSyntaxError(templateId, `unexpected {% ${keyword} %}`);
        }
        stack.pop();
        return;
      }
      case 'partial':
        append(this.parsePartialTag(templateId, tag));
        return;
      case 'yield':
        append({ type: 'yield' });
        return;
      default:
        throw new TemplateSyntaxError(templateId, `unknown tag {% ${tag} %}`);
    }
  }

  /**
   * Parse `partial "name" [for expr] [with expr | with key=expr, ...]`
   */
  private parsePartialTag(templateId: string, tag: string): PartialNode {
    const match = tag.match(PARTIAL_REGEX);
    if (!match) {
      throw new TemplateSyntaxError(templateId, `malformed {% ${tag} %}`);
    }

    const [, , name, collection, withClause] = match;
    const node: PartialNode = {
      type: 'partial',
      name,
      collection: collection ?? null,
      value: null,
      locals: null,
    };

    if (withClause === undefined) return node;

    if (/^[\w-]+\s*=[^=]/.test(withClause)) {
      node.locals = splitOutsideQuotes(withClause, ',').map((pair) => {
        const eq = pair.indexOf('=');
        const key = eq === -1 ? '' : pair.slice(0, eq).trim();
        if (key === '') {
          throw new TemplateSyntaxError(templateId, `malformed {% ${tag} %}`);
        }
        return [key, pair.slice(eq + 1).trim()];
      });
    } else if (collection !== undefined) {
      throw new TemplateSyntaxError(templateId, 'a collection partial takes key=value locals only');
    } else {
      node.value = withClause.trim();
    }

    return node;
  }

  /**
   * Evaluate a node tree against a context
   */
  private evaluate(nodes: TemplateNode[], context: TemplateContext, state: RenderState): string {
    let result = '';

    for (const node of nodes) {
      switch (node.type) {
        case 'text':
          result += node.value;
          break;
        case 'output':
          result += escape(this.evaluateExpression(node.expression, context));
          break;
        case 'if': {
          const branch = node.branches.find(
            (b) => b.condition === null || this.evaluateCondition(b.condition, context)
          );
          if (branch) {
            result += this.evaluate(branch.body, context, state);
          }
          break;
        }
        case 'for':
          result += this.evaluateLoop(node, context, state);
          break;
        case 'partial':
          result += this.evaluatePartial(node, context, state);
          break;
        case 'yield':
          result += state.body ?? '';
          break;
      }
    }

    return result;
  }

  private evaluateLoop(
    node: ForNode,
    context: TemplateContext,
    state: RenderState
  ): string {
    const source = this.getValueByPath(context, node.path);
    const items = Array.isArray(source) ? source : isIterableObject(source) ? Array.from(source) : [];

    return items
      .map((item, idx) => {
        const loopContext: TemplateContext = {
          ...context,
          [node.item]: item,
          loop: {
            index: idx,
            index1: idx + 1,
            first: idx === 0,
            last: idx === items.length - 1,
            length: items.length,
          },
        };

        if (node.index) {
          loopContext[node.index] = idx;
        }

        return this.evaluate(node.body, loopContext, state);
      })
      .join('');
  }

  private evaluatePartial(
    node: PartialNode,
    context: TemplateContext,
    state: RenderState
  ): string {
    if (!this.partialHandler) {
      throw new TemplateSyntaxError(state.templateId, `{% partial "${node.name}" %} used without a partial handler`);
    }

    const pairs: Locals = {};
    for (const [key, expression] of node.locals ?? []) {
      pairs[key] = this.evaluateExpression(expression, context);
    }

    if (node.collection !== null) {
      return this.partialHandler({
        mode: 'collection',
        name: node.name,
        collection: this.evaluateExpression(node.collection, context),
        locals: pairs,
      });
    }

    if (node.value !== null) {
      return this.partialHandler({
        mode: 'single',
        name: node.name,
        input: value(this.evaluateExpression(node.value, context)),
      });
    }

    return this.partialHandler({
      mode: 'single',
      name: node.name,
      input: node.locals ? locals(pairs) : undefined,
    });
  }

  /**
   * Evaluate a condition expression
   */
  private evaluateCondition(condition: string, context: TemplateContext): boolean {
    const alternatives = splitOutsideQuotes(condition, ' or ');
    if (alternatives.length > 1) {
      return alternatives.some((part) => this.evaluateCondition(part.trim(), context));
    }

    const conjuncts = splitOutsideQuotes(condition, ' and ');
    if (conjuncts.length > 1) {
      return conjuncts.every((part) => this.evaluateCondition(part.trim(), context));
    }

    if (condition.startsWith('not ')) {
      return !this.evaluateCondition(condition.slice(4).trim(), context);
    }

    const match = condition.match(/^(.+?)\s*(==|!=|>=|<=|>|<)\s*(.+)$/);
    if (match) {
      const [, left, operator, right] = match;
      const leftValue = this.evaluateExpression(left, context);
      const rightValue = this.evaluateExpression(right, context);

      switch (operator) {
        case '==':
          return leftValue === rightValue;
        case '!=':
          return leftValue !== rightValue;
        case '>':
          return Number(leftValue) > Number(rightValue);
        case '<':
          return Number(leftValue) < Number(rightValue);
        case '>=':
          return Number(leftValue) >= Number(rightValue);
        case '<=':
          return Number(leftValue) <= Number(rightValue);
      }
    }

    const result = this.evaluateExpression(condition, context);
    return Array.isArray(result) ? result.length > 0 : Boolean(result);
  }

  /**
   * Evaluate `value|filter|filter(arg)` in context
   */
  private evaluateExpression(expression: string, context: TemplateContext): unknown {
    const [head, ...filters] = splitOutsideQuotes(expression, '|').map((s) => s.trim());
    let result = this.evaluateSimpleValue(head ?? '', context);

    for (const filter of filters) {
      result = this.applyFilter(result, filter, context);
    }

    return result;
  }

  /**
   * Evaluate a literal or a variable path
   */
  private evaluateSimpleValue(token: string, context: TemplateContext): unknown {
    if (/^(['"]).*\1$/.test(token)) {
      return token.slice(1, -1);
    }
    if (/^-?\d+(\.\d+)?$/.test(token)) {
      return parseFloat(token);
    }
    if (token === 'true') return true;
    if (token === 'false') return false;
    if (token === 'null' || token === 'none') return null;

    return PATH_REGEX.test(token) ? this.getValueByPath(context, token) : undefined;
  }

  private getValueByPath(context: TemplateContext, path: string): unknown {
    let current: unknown = context;

    for (const part of path.split('.')) {
      if (current === null || typeof current !== 'object') return undefined;
      current = Reflect.get(current, part);
    }

    return current;
  }

  private applyFilter(input: unknown, filter: string, context: TemplateContext): unknown {
    const match = filter.match(/^(\w+)(?:\(([\s\S]*)\))?$/);
    if (!match) return input;

    const [, name, argList] = match;
    const args = argList
      ? splitOutsideQuotes(argList, ',').map((arg) => this.evaluateSimpleValue(arg.trim(), context))
      : [];

    switch (name) {
      case 'upper':
        return String(input ?? '').toUpperCase();
      case 'lower':
        return String(input ?? '').toLowerCase();
      case 'capitalize': {
        const str = String(input ?? '');
        return str.charAt(0).toUpperCase() + str.slice(1).toLowerCase();
      }
      case 'trim':
        return String(input ?? '').trim();
      case 'truncate': {
        const length = args[0] === undefined ? 50 : Number(args[0]);
        const str = String(input ?? '');
        return str.length > length ? str.slice(0, Math.max(0, length - 3)) + '...' : str;
      }
      case 'default':
        return input === undefined || input === null || input === '' ? args[0] : input;
      case 'length':
        if (Array.isArray(input) || typeof input === 'string') return input.length;
        return 0;
      case 'join':
        return Array.isArray(input) ? input.join(String(args[0] ?? ', ')) : input;
      case 'json':
        return JSON.stringify(input);
      case 'escape':
        return new SafeHtml(escape(input));
      case 'safe':
        return input instanceof SafeHtml ? input : new SafeHtml(String(input ?? ''));
      default:
        return input;
    }
  }
}

function isIterableObject(candidate: unknown): candidate is Iterable<unknown> {
  return (
    candidate !== null &&
    typeof candidate === 'object' &&
    Symbol.iterator in candidate &&
    typeof candidate[Symbol.iterator] === 'function'
  );
}

/**
 * Split on a separator, ignoring separators inside quoted strings
 */
function splitOutsideQuotes(input: string, separator: string): string[] {
  const parts: string[] = [];
  let current = '';
  let quote: string | null = null;
  let i = 0;

  while (i < input.length) {
    const char = input[i];

    if (quote) {
      if (char === quote) quote = null;
      current += char;
      i++;
    } else if (char === '"' || char === "'") {
      quote = char;
      current += char;
      i++;
    } else if (input.startsWith(separator, i)) {
      parts.push(current);
      current = '';
      i += separator.length;
    } else {
      current += char;
      i++;
    }
  }

  parts.push(current);
  return parts;
}
