/**
 * Error message templates.
 *
 * @packageDocumentation
 */

export type { CompiledTemplate } from './engine.js';
export { formatValue, isTruthy, parseTemplate } from './engine.js';
export type { BuiltinTemplateName, ErrorContext, RenderInput, TemplateErrorEntry } from './renderer.js';
export {
  BUILTIN_TEMPLATES,
  DEFAULT_TEMPLATE,
  MAX_DOCUMENT_LENGTH,
  buildErrorContext,
  getBuiltinTemplate,
  renderValidationError,
  resolveTemplate,
} from './renderer.js';
