/**
 * @module utils/index
 * Re-exports all shared utilities.
 */

export { shell, shellStrict, hasCommand, TIMEOUT_EXIT_CODE, type ShellResult, type ShellOptions } from './shell.js';
export { ensureDir, nowStamp, makeTempDir, writeJson } from './fs.js';
export { request, requestOk, HttpError, type HttpRequest, type HttpResponse } from './http.js';
export { loadDotenv, parseDotenv } from './env.js';
