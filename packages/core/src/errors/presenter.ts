/**
 * ErrorPresenter - pure presentation layer for IdlGenError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import type { IdlGenError, SerializedError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  details: string[];
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: IdlGenError): CLIErrorView {
    const user = error.toUserError();
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: user.location ? `Location: ${user.location}` : undefined,
      details: this.#formatDetails(error),
      workaround: error.suggestions[0],
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout?.columns || 80,
    };
  }

  formatForLog(error: IdlGenError): SerializedError {
    return error.toJSON(this.env);
  }

  // Document issues are listed one per line; other context stays in the log view
  #formatDetails(error: IdlGenError): string[] {
    const issues = error.context?.issues;
    if (!Array.isArray(issues)) return [];
    return issues.filter((issue): issue is string => typeof issue === 'string');
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this.env === 'dev';
    return opt;
  }
}
