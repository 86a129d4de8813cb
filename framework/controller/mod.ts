/**
 * Controller Layer
 *
 * Request handling that answers with rendered views.
 */

export { Controller } from './base.ts';
