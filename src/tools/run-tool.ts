/**
 * Shared execution wrapper for tools.
 * Validates parameters, runs the tool body and maps thrown errors to a
 * structured error response. AppError subclasses keep their code and details;
 * unknown errors become INTERNAL_ERROR without leaking their message.
 */

import { AppError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ToolDescriptor, ToolResponse } from '../types/tools.js';
import { validateParameters } from './validate-parameters.js';

export async function runTool<T>(
  descriptor: ToolDescriptor,
  params: Record<string, unknown>,
  logProvider: ILogProvider,
  body: () => Promise<T>
): Promise<ToolResponse<T>> {
  const toolName = descriptor.name;

  const errors = validateParameters(params, descriptor.parameters);
  if (errors.length > 0) {
    return {
      toolName,
      status: 'error',
      error: { code: 'INVALID_REQUEST', message: errors.join('; '), details: { fields: errors } },
    };
  }

  try {
    return { toolName, status: 'success', result: await body() };
  } catch (err) {
    if (err instanceof AppError) {
      const level = err.statusCode >= 500 ? 'error' : 'warn';
      logProvider.log({
        level,
        message: `Tool ${toolName} failed`,
        fields: { code: err.code, message: err.message },
      });
      return {
        toolName,
        status: 'error',
        error: {
          code: err.code,
          message: err.message,
          ...(err.details && { details: err.details }),
        },
      };
    }

    logProvider.error(`Tool ${toolName} crashed`, {
      error: err instanceof Error ? err.message : String(err),
    });
    return {
      toolName,
      status: 'error',
      error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
    };
  }
}
