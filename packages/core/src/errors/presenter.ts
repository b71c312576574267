/**
 * ErrorPresenter - pure presentation layer for ReflectSchemaError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import {
  ValidationError,
  redactValue,
  type ErrorContext,
  type ReflectSchemaError,
  type SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
  redactKeys?: string[];
  requestId?: string;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  path?: string;
  schemaPath?: string;
  excerpt?: string;
  workaround?: string;
  failures: string[];
  colors: boolean;
  terminalWidth: number;
}

export type ProductionView = SerializedError & { requestId?: string };

const DEFAULT_REDACT_KEYS = [
  'password',
  'apiKey',
  'secret',
  'token',
  'ssn',
  'creditCard',
];

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: ReflectSchemaError): CLIErrorView {
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      path: error.context?.path,
      schemaPath: error.context?.schemaPath,
      excerpt: error.context?.valueExcerpt,
      workaround: error.context?.suggestion,
      failures: this.#formatFailures(error),
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  formatForProduction(error: ReflectSchemaError): ProductionView {
    // the error already redacts its own keys; apply the presenter's on top
    const base = error.toJSON('prod');
    const view: SerializedError =
      base.context && 'value' in base.context
        ? {
            ...base,
            context: {
              ...base.context,
              value: redactValue(
                base.context.value,
                new Set(this.options.redactKeys ?? DEFAULT_REDACT_KEYS)
              ),
            },
          }
        : base;
    return { ...view, requestId: this.#getRequestId() };
  }

  #formatTitle(error: ReflectSchemaError): string {
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    const loc = ctx.path || ctx.schemaPath || ctx.definition;
    return loc ? `Location: ${loc}` : undefined;
  }

  // only the first one is already part of the title
  #formatFailures(error: ReflectSchemaError): string[] {
    if (!(error instanceof ValidationError)) {
      return [];
    }
    return error.failures
      .slice(1)
      .map((failure) => `${failure.path || '/'} ${failure.message}`);
  }

  #getRequestId(): string | undefined {
    return this.options.requestId || process.env.REQUEST_ID || undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this.env === 'dev';
    return opt;
  }

  #getTerminalWidth(opt?: number): number {
    return opt || process.stdout?.columns || 80;
  }
}

export default ErrorPresenter;
