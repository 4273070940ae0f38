// Re-export the program factory and the engine so the CLI package can serve
// as a single entrypoint for tools and scripts.
export { createProgram, consoleIO, parseChannelList, formatEventLine, type CliIO } from './cli.js';
export * from '@trackline/engine';
