/**
 * Renders validation failures through user-configurable templates.
 *
 * @packageDocumentation
 */

import { TemplateError, errorMessage } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import { formatFullMessage, truncate, type ValidationErrorDetail } from '../validation/errors.js';
import { parseTemplate } from './engine.js';

/**
 * Names of the built-in templates.
 */
export type BuiltinTemplateName = 'basic' | 'detailed' | 'simple' | 'with_path' | 'with_schema' | 'verbose';

/**
 * Built-in templates, selectable by name.
 */
export const BUILTIN_TEMPLATES: Readonly<Record<BuiltinTemplateName, string>> = {
  basic: '{{range .Errors}}{{.Message}}\n{{end}}',
  detailed:
    '{{.ErrorCount}} validation error(s) found:\n{{range $i, $e := .Errors}}{{add $i 1}}. {{.Message}} at {{.DocumentPath}}\n{{end}}',
  simple: '{{.FullMessage}}',
  with_path: '{{range .Errors}}{{.DocumentPath}}: {{.Message}}\n{{end}}',
  with_schema: 'Schema {{.SchemaFile}} validation failed:\n{{.FullMessage}}',
  verbose:
    'Validation Results:\nSchema: {{.SchemaFile}}\nErrors: {{.ErrorCount}}\nFull Message: {{.FullMessage}}\n\nIndividual Errors:\n{{range $i, $e := .Errors}}Error {{add $i 1}}:\n  Document Path: {{.DocumentPath}}\n  Schema Path: {{.SchemaPath}}\n  Message: {{.Message}}{{if .Value}}\n  Value: {{.Value}}{{end}}\n\n{{end}}',
};

/**
 * Template used when none is configured.
 */
export const DEFAULT_TEMPLATE = '{{.FullMessage}}';

/**
 * Longest document excerpt exposed to templates.
 */
export const MAX_DOCUMENT_LENGTH = 500;

function isBuiltinTemplateName(name: string): name is BuiltinTemplateName {
  return Object.prototype.hasOwnProperty.call(BUILTIN_TEMPLATES, name);
}

/**
 * Returns a built-in template by name, or undefined for unknown names.
 */
export function getBuiltinTemplate(name: string): string | undefined {
  return isBuiltinTemplateName(name) ? BUILTIN_TEMPLATES[name] : undefined;
}

/**
 * Resolves a configured template: empty means the default, a built-in
 * name means that template, anything else is used as written.
 */
export function resolveTemplate(template: string | undefined): string {
  if (template === undefined || template === '') {
    return DEFAULT_TEMPLATE;
  }
  return getBuiltinTemplate(template) ?? template;
}

/**
 * One error as seen by templates.
 */
export interface TemplateErrorEntry {
  readonly Message: string;
  /** Same as DocumentPath. */
  readonly Path: string;
  readonly DocumentPath: string;
  readonly SchemaPath: string;
  readonly Value: string;
}

/**
 * Data available to error templates.
 */
export interface ErrorContext {
  /** URI the schema was compiled under. */
  readonly Schema: string;
  /** Schema path as configured. */
  readonly SchemaFile: string;
  /** Document content, truncated. */
  readonly Document: string;
  readonly FullMessage: string;
  /** Same as FullMessage. */
  readonly Error: string;
  /** Document path of the first error. */
  readonly Path: string;
  readonly ErrorCount: number;
  readonly Errors: readonly TemplateErrorEntry[];
}

/**
 * Input for {@link renderValidationError}.
 */
export interface RenderInput {
  /** Sorted validation details. */
  readonly details: readonly ValidationErrorDetail[];
  readonly schemaUri: string;
  readonly schemaFile: string;
  /** Raw document content. */
  readonly document: string;
  /** Template text or built-in name; empty for the default. */
  readonly template?: string | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Builds the template context for a failed validation.
 */
export function buildErrorContext(input: RenderInput): ErrorContext {
  const fullMessage = formatFullMessage(input.schemaUri, input.details);
  return {
    Schema: input.schemaUri,
    SchemaFile: input.schemaFile,
    Document: truncate(input.document, MAX_DOCUMENT_LENGTH),
    FullMessage: fullMessage,
    Error: fullMessage,
    Path: input.details[0]?.documentPath ?? '',
    ErrorCount: input.details.length,
    Errors: input.details.map((detail) => ({
      Message: detail.message,
      Path: detail.documentPath,
      DocumentPath: detail.documentPath,
      SchemaPath: detail.schemaPath,
      Value: detail.value,
    })),
  };
}

/**
 * Replaces `{error}`-style placeholders in a template without actions.
 */
function renderPlaceholders(template: string, context: ErrorContext): string {
  const values: Record<string, string> = {
    '{error}': context.FullMessage,
    '{full_message}': context.FullMessage,
    '{schema}': context.SchemaFile,
    '{document}': context.Document,
    '{path}': context.Path,
    '{error_count}': String(context.ErrorCount),
  };
  return template.replace(/\{(?:error|full_message|schema|document|path|error_count)\}/g, (match) => values[match] ?? match);
}

/**
 * Renders a validation failure.
 *
 * Never throws: when the template cannot be parsed or executed, returns
 * `validation failed (template error: <reason>): <full message>`.
 *
 * @example
 * ```typescript
 * renderValidationError({ details, schemaUri, schemaFile: 'user.json', document, template: 'detailed' });
 * // '2 validation error(s) found:\n1. must be integer at /age\n2. ...'
 * ```
 */
export function renderValidationError(input: RenderInput): string {
  const context = buildErrorContext(input);
  const template = resolveTemplate(input.template);

  if (!template.includes('{{')) {
    return renderPlaceholders(template, context);
  }

  try {
    return parseTemplate(template).execute(context);
  } catch (error) {
    const reason = error instanceof TemplateError ? error.message : errorMessage(error);
    input.logger?.warn('template_render_failed', { reason, schema: input.schemaFile });
    return `validation failed (template error: ${reason}): ${context.FullMessage}`;
  }
}
