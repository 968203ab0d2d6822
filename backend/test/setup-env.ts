/**
 * Runs before every spec file (vitest setupFiles).
 * The logger reads these at import time, so they must be set before any src import.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
