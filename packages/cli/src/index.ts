#!/usr/bin/env node

/**
 * WPCOM Fleet CLI (wpfleet)
 *
 * Command-line tools for listing, exporting and toggling configuration
 * on a fleet of Jetpack-connected sites through the WordPress.com API.
 */

import { createProgram } from './program';
import { formatError } from './formatters';
import { getErrorMessage } from './errors';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(formatError(getErrorMessage(error)));
    process.exit(1);
  });
