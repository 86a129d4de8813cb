/**
 * Presentation Layer (View/Template)
 *
 * Page and partial rendering.
 *
 * Responsibilities:
 * - Resolve partial names, locals and render options
 * - Render templates with auto-escaping
 * - Apply layouts to pages, never to partials
 */

export {
  PartialResolver,
  locals,
  value,
  isCollection,
  type NamingConvention,
  type Locals,
  type PartialInput,
  type PartialOptions,
  type CollectionOptions,
  type PartialDescriptor,
  type PartialResolverOptions,
} from './partial.ts';
export {
  TemplateEngine,
  type TemplateOptions,
  type TemplateContext,
  type RenderOptions,
  type PartialCall,
  type PartialHandler,
} from './template.ts';
export { View, type ViewOptions, type ViewHelpers } from './view.ts';
export { html, escape, raw, SafeHtml } from './html.ts';
export {
  ViewError,
  InvalidTemplateNameError,
  InvalidCollectionError,
  TemplateNotFoundError,
  TemplateSyntaxError,
  RenderDepthError,
  type ViewErrorCode,
} from './errors.ts';
