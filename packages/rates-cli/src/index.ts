export { ApiRequestError, requestJson } from './client.js';
export { executeCommand } from './commands.js';
export { formatRate, renderResponse } from './format.js';
export { parseCommand } from './parser.js';
export type { CommandResponse } from './responses.js';
export type { CliOptions, ParsedCommand } from './types.js';
