/**
 * Tool types: descriptors and tagged responses shared by every analysis tool.
 */

import type { ParameterSchema } from './common.js';

export interface ToolDescriptor {
  name: string;
  description: string;
  version: string;
  parameters: ParameterSchema;
}

export interface ToolErrorBody {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export type ToolResponse<T = unknown> =
  | { toolName: string; status: 'success'; result: T }
  | { toolName: string; status: 'error'; error: ToolErrorBody };

export interface ITool<T = unknown> {
  info(): ToolDescriptor;
  /** Never rejects: failures come back as `status: 'error'`. */
  execute(params: Record<string, unknown>): Promise<ToolResponse<T>>;
}
