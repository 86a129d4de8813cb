/**
 * Base Controller
 *
 * Turns rendered pages and partials into HTML responses. Partial responses
 * suit requests that swap a fragment of an already loaded page.
 */

import type { View } from '../view/view.ts';
import type { CollectionOptions, Locals, PartialInput, PartialOptions } from '../view/partial.ts';
import type { RenderOptions } from '../view/template.ts';

const HTML_CONTENT_TYPE = 'text/html; charset=utf-8';

/**
 * Base controller
 */
export abstract class Controller {
  protected view!: View;

  /**
   * Bind the view used by the render helpers
   */
  setView(view: View): this {
    this.view = view;
    return this;
  }

  /**
   * Send an HTML response
   */
  html(content: string, status = 200): Response {
    return new Response(content, {
      status,
      headers: { 'Content-Type': HTML_CONTENT_TYPE },
    });
  }

  /**
   * Render a page with its layout
   */
  render(name: string, locals: Locals = {}, options: RenderOptions = {}, status = 200): Response {
    return this.html(this.view.render(name, locals, options), status);
  }

  /**
   * Render a single partial, never wrapped in the layout
   */
  renderPartial(name: string, input?: PartialInput, options: PartialOptions = {}, status = 200): Response {
    return this.html(this.view.partial(name, input, options), status);
  }

  renderCollection(name: string, options: CollectionOptions, status = 200): Response {
    return this.html(this.view.collection(name, options), status);
  }
}
