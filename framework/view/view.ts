/**
 * View
 *
 * Caller-facing rendering surface. Pages render through the template engine
 * with their layout; partials go through the resolver first, so they never
 * pick up the layout and follow the configured naming convention.
 *
 * The view installs itself as the engine's partial handler, which makes
 * `{% partial %}` available inside templates:
 *
 * ```html
 * {% partial "header" with title="Posts" %}
 * {% partial "post" for posts %}
 * ```
 */

import type { Config } from '../config/config.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import { withSpanSync } from '../telemetry/otel.ts';
import { InvalidCollectionError } from './errors.ts';
import {
  isCollection,
  PartialResolver,
  type CollectionOptions,
  type Locals,
  type NamingConvention,
  type PartialInput,
  type PartialOptions,
} from './partial.ts';
import { TemplateEngine, type PartialCall, type RenderOptions } from './template.ts';

export interface ViewOptions {
  engine?: TemplateEngine;
  resolver?: PartialResolver;
  /** Naming convention for a resolver created by the view */
  naming?: NamingConvention;
  logger?: Logger;
}

/**
 * Partial helpers handed to code-side views. `collection` is the
 * `partial(name, { collection })` form: one render per member.
 */
export interface ViewHelpers {
  partial(name: string, input?: PartialInput, options?: PartialOptions): string;
  collection(name: string, options: CollectionOptions): string;
}

export class View {
  readonly engine: TemplateEngine;
  readonly resolver: PartialResolver;
  private logger: Logger;

  constructor(options: ViewOptions = {}) {
    this.engine = options.engine ?? new TemplateEngine();
    this.resolver = options.resolver ?? new PartialResolver({ naming: options.naming });
    this.logger = (options.logger ?? getLogger()).child({ component: 'view' });
    this.engine.setPartialHandler((call) => this.renderPartialCall(call));
  }

  /**
   * Build a view from the `views` section of the configuration
   */
  static fromConfig(config: Config, logger?: Logger): View {
    const settings = config.views();

    return new View({
      engine: new TemplateEngine({
        viewsPath: settings.path,
        extension: settings.extension,
        cache: settings.cache,
        defaultLayout: settings.layout === false ? undefined : settings.layout,
      }),
      naming: settings.naming,
      logger,
    });
  }

  /**
   * Load templates from the views directory
   */
  async load(): Promise<string[]> {
    const loaded = await this.engine.load();
    this.logger.info('Templates loaded', { count: loaded.length });
    return loaded;
  }

  /**
   * Render a page template, wrapped in the layout unless `layout: false`
   */
  render(name: string, locals: Locals = {}, options: RenderOptions = {}): string {
    return withSpanSync(
      'view.render',
      () => this.engine.render(name, options, locals),
      { attributes: { 'view.template': name } },
    );
  }

  /**
   * Render a partial once
   */
  partial(name: string, input?: PartialInput, options: PartialOptions = {}): string {
    const { engineTemplateId, locals, renderOptions } = this.resolver.resolve(name, input, options);

    return withSpanSync(
      'view.partial',
      () => {
        this.logger.debug('Rendering partial', { partial: name, template: engineTemplateId });
        return this.engine.render(engineTemplateId, renderOptions, locals);
      },
      { attributes: { 'view.partial': name, 'view.template': engineTemplateId } },
    );
  }

  /**
   * Render a partial once per collection member, joined by newlines
   */
  collection(name: string, options: CollectionOptions): string {
    const descriptors = this.resolver.resolveCollection(name, options);

    return withSpanSync(
      'view.collection',
      (span) => {
        span.setAttribute('view.collection.size', descriptors.length);
        this.logger.debug('Rendering partial collection', { partial: name, size: descriptors.length });

        return descriptors
          .map((d) => this.engine.render(d.engineTemplateId, d.renderOptions, d.locals))
          .join('\n');
      },
      { attributes: { 'view.partial': name } },
    );
  }

  helpers(): ViewHelpers {
    return {
      partial: (name, input, options) => this.partial(name, input, options),
      collection: (name, options) => this.collection(name, options),
    };
  }

  private renderPartialCall(call: PartialCall): string {
    if (call.mode === 'single') {
      return this.partial(call.name, call.input);
    }

    if (!isCollection(call.collection)) {
      throw new InvalidCollectionError(call.name, call.collection);
    }
    return this.collection(call.name, { collection: call.collection, locals: call.locals });
  }
}
