/**
 * Input validation utilities using Zod
 */

import { z } from 'zod';
import type { ClassifierRule, TaskRequest, WorkflowDefinition } from '../types.js';
import { ConfigurationError } from './errors.js';

// Common schemas
export const IdentifierSchema = z.string().min(1).max(100).regex(/^[a-z0-9][a-z0-9_.:-]*$/);
export const CategorySchema = IdentifierSchema;
export const CapabilityNameSchema = IdentifierSchema;
export const SeveritySchema = z.enum(['critical', 'important', 'minor', 'positive']);

// Task request
export const TaskRequestSchema = z.object({
  description: z.string().max(100_000),
  categories: z.array(CategorySchema).optional(),
  flags: z.record(z.boolean()).optional(),
  target: z.string().min(1).optional(),
});

// Classifier rule table
export const ClassifierRuleSchema = z.object({
  category: CategorySchema,
  patterns: z.array(z.string().trim().min(1)).min(1),
  weight: z.number().gt(0).max(1),
});

export const RuleTableSchema = z.object({
  version: z.string().default('1'),
  rules: z.array(ClassifierRuleSchema).min(1),
});

// Workflow definitions
export const PhaseDefinitionSchema = z.object({
  id: IdentifierSchema,
  name: z.string().min(1),
  capabilities: z.array(CapabilityNameSchema).min(1),
  mode: z.enum(['sequential', 'parallel']).default('parallel'),
  dependsOn: z.array(IdentifierSchema).default([]),
  toggle: IdentifierSchema.optional(),
  producesMetrics: z.boolean().optional(),
});

export const WorkflowToggleSchema = z.object({
  description: z.string().default(''),
  default: z.boolean().default(false),
});

export const WorkflowDefinitionSchema = z.object({
  id: IdentifierSchema,
  version: z.string().default('1.0.0'),
  name: z.string().min(1),
  description: z.string().default(''),
  categories: z.array(CategorySchema).min(1),
  phases: z.array(PhaseDefinitionSchema).min(1),
  toggles: z.record(WorkflowToggleSchema).default({}),
});

export const WorkflowFileSchema = z.object({
  workflows: z.array(WorkflowDefinitionSchema).min(1),
});

// Capability output
export const FindingSchema = z.object({
  sourceCapability: CapabilityNameSchema,
  component: z.string().min(1),
  issueSignature: z.string().min(1),
  severity: SeveritySchema,
  description: z.string().min(1),
  evidence: z.string().optional(),
  remediation: z.string().optional(),
});

export const CapabilityResponseSchema = z.object({
  findings: z.array(FindingSchema),
  status: z.enum(['complete', 'partial']).default('complete'),
  metrics: z.record(z.number().finite()).optional(),
});

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

/**
 * Parse a value against a schema, raising ConfigurationError on failure
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  what: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${what}`, describeIssues(result.error));
  }
  return result.data;
}

export function validateTaskRequest(value: unknown): TaskRequest {
  return parseOrThrow(TaskRequestSchema, value, 'task request');
}

export function parseRuleTable(value: unknown): ClassifierRule[] {
  return parseOrThrow(RuleTableSchema, value, 'classifier rule table').rules;
}

export function parseWorkflowDefinitions(value: unknown): WorkflowDefinition[] {
  return parseOrThrow(WorkflowFileSchema, value, 'workflow definitions').workflows;
}

export function parseWorkflowDefinition(value: unknown): WorkflowDefinition {
  return parseOrThrow(WorkflowDefinitionSchema, value, 'workflow definition');
}
