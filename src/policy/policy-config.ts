// Policy configuration: organisation-specific minimum required values per entity type.
// Validated with zod before any document is evaluated; any problem is a ConfigurationError.

import * as fs from 'fs-extra';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../errors';

const FieldPathSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/, 'must be a dot-separated field path such as creationInfo.licenseListVersion');

export const PolicyCheckSchema = z.union([
  z.literal('required'),
  z.literal('nonPlaceholder'),
  z.object({ oneOf: z.array(z.union([z.string(), z.number(), z.boolean()])).min(1) }).strict()
]);

const PolicyGuardSchema = z
  .object({
    fieldPath: FieldPathSchema,
    check: PolicyCheckSchema
  })
  .strict();

export const PolicyRequirementSchema = z
  .object({
    fieldPath: FieldPathSchema,
    check: PolicyCheckSchema,
    code: z.string().min(1).optional(),
    message: z.string().min(1).optional(),
    // one guard, or a list where any passing guard applies the requirement
    when: z.union([PolicyGuardSchema, z.array(PolicyGuardSchema).min(1)]).optional()
  })
  .strict();

// An empty YAML section (`Package:`) loads as null.
const Requirements = z.array(PolicyRequirementSchema).nullish();

export const PolicyConfigSchema = z
  .object({
    Document: Requirements,
    Package: Requirements,
    File: Requirements,
    Snippet: Requirements,
    ExtractedLicensingInfo: Requirements,
    Relationship: Requirements,
    primaryPackageFirst: z.boolean().optional()
  })
  .strict();

export type PolicyCheck = z.infer<typeof PolicyCheckSchema>;
export type PolicyGuard = z.infer<typeof PolicyGuardSchema>;
export type PolicyRequirement = z.infer<typeof PolicyRequirementSchema>;
export type PolicyConfig = z.infer<typeof PolicyConfigSchema>;

export const DEFAULT_POLICY_FILE = path.join(__dirname, '..', '..', 'config', 'minimum-required-values.yaml');

// null / undefined (an empty YAML file) is an empty policy.
export function parsePolicyConfig(raw: unknown, source = 'policy configuration'): PolicyConfig {
  if (raw === undefined || raw === null) return {};
  const result = PolicyConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`);
    throw new ConfigurationError(`Invalid ${source}`, issues);
  }
  return result.data;
}

export async function loadPolicyConfig(file: string): Promise<PolicyConfig> {
  if (!(await fs.pathExists(file))) throw new ConfigurationError(`Policy file not found: ${file}`);
  const text = await fs.readFile(file, 'utf8');
  let raw: unknown;
  try {
    raw = file.toLowerCase().endsWith('.json') ? JSON.parse(text) : yaml.load(text);
  } catch (e) {
    throw new ConfigurationError(`Cannot parse policy file ${file}: ${errorMessage(e)}`);
  }
  return parsePolicyConfig(raw, `policy file ${file}`);
}
