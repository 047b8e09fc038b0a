/**
 * Output utilities for CLI subcommands
 */

export interface OutputOptions {
  json?: boolean;
  verbose?: boolean;
}

let globalOptions: OutputOptions = {};

export function setOutputOptions(options: OutputOptions): void {
  globalOptions = { ...globalOptions, ...options };
}

export function getOutputOptions(): OutputOptions {
  return globalOptions;
}

export function output(data: unknown, humanReadable?: string): void {
  if (globalOptions.json) {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(humanReadable ?? String(data));
  }
}

export function outputError(message: string, error?: Error): void {
  if (globalOptions.json) {
    console.error(JSON.stringify({
      error: message,
      details: error?.message,
    }));
  } else {
    console.error(`Error: ${message}`);
    if (error) {
      console.error(globalOptions.verbose ? error.stack : `  ${error.message}`);
    }
  }
}

export function outputSuccess(message: string, data?: unknown): void {
  if (globalOptions.json) {
    const result: { success: boolean; message: string; data?: unknown } = {
      success: true,
      message,
    };
    if (data !== undefined) {
      result.data = data;
    }
    console.log(JSON.stringify(result));
  } else {
    console.log(`✓ ${message}`);
  }
}
