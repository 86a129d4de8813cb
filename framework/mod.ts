/**
 * View Partials Framework
 *
 * Layered view rendering for server-side HTML: pages with layouts, and
 * partials rendered singly or once per collection member.
 *
 * @module
 */

// Configuration
export { Config, ConfigError, loadConfig, type ConfigOptions, type ViewSettings } from './config/mod.ts';

// Controller
export { Controller } from './controller/mod.ts';

// View
export {
  View,
  PartialResolver,
  TemplateEngine,
  locals,
  value,
  isCollection,
  html,
  escape,
  raw,
  SafeHtml,
  ViewError,
  InvalidTemplateNameError,
  InvalidCollectionError,
  TemplateNotFoundError,
  TemplateSyntaxError,
  RenderDepthError,
  type ViewOptions,
  type ViewHelpers,
  type NamingConvention,
  type Locals,
  type PartialInput,
  type PartialOptions,
  type CollectionOptions,
  type PartialDescriptor,
  type PartialResolverOptions,
  type TemplateOptions,
  type TemplateContext,
  type RenderOptions,
  type PartialCall,
  type PartialHandler,
  type ViewErrorCode,
} from './view/mod.ts';

// Telemetry
export {
  Logger,
  getLogger,
  setLogger,
  withSpanSync,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
} from './telemetry/mod.ts';
