#!/usr/bin/env node

/**
 * jsonschema-validator CLI entry point.
 */

import { createCliContext, runCli } from './app.js';
import { withErrorHandling } from './utils/errorHandling.js';

const context = createCliContext();
withErrorHandling(() => runCli(context), context.io);
