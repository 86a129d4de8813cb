/**
 * View Errors
 *
 * Error types raised by the view layer. Every error carries a stable `code`
 * so callers can branch without matching on messages.
 */

export type ViewErrorCode =
  | 'INVALID_TEMPLATE_NAME'
  | 'INVALID_COLLECTION'
  | 'TEMPLATE_NOT_FOUND'
  | 'TEMPLATE_SYNTAX'
  | 'RENDER_DEPTH_EXCEEDED';

/**
 * Base class for view layer errors
 */
export class ViewError extends Error {
  readonly code: ViewErrorCode;

  constructor(code: ViewErrorCode, message: string) {
    super(message);
    this.name = 'ViewError';
    this.code = code;
  }
}

/**
 * Partial name is empty or not a valid template identifier
 */
export class InvalidTemplateNameError extends ViewError {
  readonly templateName: unknown;

  constructor(templateName: unknown) {
    super('INVALID_TEMPLATE_NAME', `Invalid template name: ${JSON.stringify(templateName) ?? String(templateName)}`);
    this.name = 'InvalidTemplateNameError';
    this.templateName = templateName;
  }
}

/**
 * Collection argument is not an ordered, enumerable sequence
 */
export class InvalidCollectionError extends ViewError {
  constructor(templateName: string, received: unknown) {
    const kind = received === null ? 'null' : typeof received;
    super('INVALID_COLLECTION', `Collection for partial '${templateName}' must be an array or iterable, got ${kind}`);
    this.name = 'InvalidCollectionError';
  }
}

export class TemplateNotFoundError extends ViewError {
  readonly templateId: string;

  constructor(templateId: string) {
    super('TEMPLATE_NOT_FOUND', `Template not found: ${templateId}`);
    this.name = 'TemplateNotFoundError';
    this.templateId = templateId;
  }
}

export class TemplateSyntaxError extends ViewError {
  readonly templateId: string;

  constructor(templateId: string, detail: string) {
    super('TEMPLATE_SYNTAX', `Syntax error in template '${templateId}': ${detail}`);
    this.name = 'TemplateSyntaxError';
    this.templateId = templateId;
  }
}

/**
 * Nested renders went deeper than the engine allows, usually a partial that
 * renders itself
 */
export class RenderDepthError extends ViewError {
  readonly maxDepth: number;

  constructor(templateId: string, maxDepth: number) {
    super('RENDER_DEPTH_EXCEEDED', `Maximum render depth (${maxDepth}) exceeded while rendering '${templateId}'`);
    this.name = 'RenderDepthError';
    this.maxDepth = maxDepth;
  }
}
