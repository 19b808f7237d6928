/**
 * Reporting of validation results in text or JSON.
 */

import type {
  DocumentResult,
  DocumentStatus,
  EntryRef,
  RunReport,
  SchemaEntryResult,
} from '../validation/orchestrator.js';
import type { ValidationErrorDetail } from '../validation/errors.js';
import type { CliIo } from './types.js';

/**
 * Receives results while a run progresses and the report when it ends.
 */
export interface Reporter {
  onDocument: (result: DocumentResult, entry: EntryRef) => void;
  onEntryFailure: (result: SchemaEntryResult) => void;
  finish: (report: RunReport) => void;
}

/**
 * One document in the JSON report.
 */
export interface JsonDocumentReport {
  document: string;
  status: DocumentStatus;
  errorCount?: number;
  message?: string;
  errors?: ValidationErrorDetail[];
}

/**
 * One schema entry in the JSON report.
 */
export interface JsonSchemaReport {
  schema: string;
  error?: string;
  documents: JsonDocumentReport[];
}

/**
 * The JSON report printed by `--format json`.
 */
export interface JsonReport {
  valid: boolean;
  exitCode: number;
  schemas: JsonSchemaReport[];
}

/**
 * Builds the JSON report for a run.
 */
export function toJsonReport(report: RunReport): JsonReport {
  return {
    valid: report.valid,
    exitCode: report.exitCode,
    schemas: report.entries.map((entry) => {
      const schema: JsonSchemaReport = {
        schema: entry.schema,
        documents: entry.documents.map((result) => {
          const document: JsonDocumentReport = { document: result.document, status: result.status };
          if (result.errors !== undefined) {
            document.errorCount = result.errors.length;
          }
          if (result.message !== undefined) {
            document.message = result.message;
          }
          if (result.errors !== undefined) {
            document.errors = [...result.errors];
          }
          return document;
        }),
      };
      if (entry.failure !== undefined) {
        schema.error = entry.failure.message;
      }
      return schema;
    }),
  };
}

/**
 * Streams one line per document: successes on stdout, failures on stderr.
 */
export function createTextReporter(io: CliIo, options: { quiet: boolean }): Reporter {
  return {
    onDocument(result) {
      if (result.status === 'valid') {
        if (!options.quiet) {
          io.stdout(`✓ ${result.document}: valid\n`);
        }
        return;
      }
      io.stderr(`document "${result.document}": ${result.message ?? result.status}\n`);
    },
    onEntryFailure(result) {
      io.stderr(`schema "${result.schema}": ${result.failure?.message ?? 'failed'}\n`);
    },
    finish() {
      // Text output is written as results arrive.
    },
  };
}

/**
 * Prints the whole report as one JSON object when the run ends.
 */
export function createJsonReporter(io: CliIo): Reporter {
  return {
    onDocument() {
      // Collected in the final report.
    },
    onEntryFailure() {
      // Collected in the final report.
    },
    finish(report) {
      io.stdout(`${JSON.stringify(toJsonReport(report), null, 2)}\n`);
    },
  };
}
