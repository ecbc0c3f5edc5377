/**
 * Argument schemas for the agent-facing tools.
 * Plain JSON Schema objects, so they can be handed to a model's tool API as-is.
 */

import Ajv from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import { ToolArgumentError } from '../errors.js';

export interface QueryToolArgs {
  /** SQL to run */
  query: string;
  /** Why the model is running it; shown to the user, never executed */
  intent?: string;
}

export interface UpdateDashboardArgs {
  query: string;
  title: string;
}

export const queryToolArgsSchema = {
  type: 'object' as const,
  properties: {
    query: { type: 'string' as const },
    intent: { type: 'string' as const },
  },
  required: ['query'] as const,
  additionalProperties: false,
};

export const updateDashboardArgsSchema = {
  type: 'object' as const,
  properties: {
    query: { type: 'string' as const },
    title: { type: 'string' as const, minLength: 1 },
  },
  required: ['query', 'title'] as const,
  additionalProperties: false,
};

// ajv ships CommonJS; under ESM the class sits on `.default`.
const ajv = new Ajv.default({ allErrors: true });

const validators = {
  query: ajv.compile<QueryToolArgs>(queryToolArgsSchema),
  updateDashboard: ajv.compile<UpdateDashboardArgs>(updateDashboardArgsSchema),
};

function describeErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || '(root)'} ${e.message ?? 'is invalid'}`.trim());
}

function check<T>(tool: string, validate: ValidateFunction<T>, args: unknown): T {
  if (!validate(args)) {
    throw new ToolArgumentError(tool, describeErrors(validate.errors));
  }
  return args;
}

export function parseQueryToolArgs(args: unknown): QueryToolArgs {
  return check('query', validators.query, args);
}

export function parseUpdateDashboardArgs(args: unknown): UpdateDashboardArgs {
  return check('update_dashboard', validators.updateDashboard, args);
}
