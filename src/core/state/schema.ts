/**
 * Zod schemas for the Terraform state file shape the migrator relies on.
 * Unknown fields are allowed everywhere; only the fields the migrator reads
 * are checked.
 */
import { z } from 'zod';

export const StateInstanceSchema = z.looseObject({
  schema_version: z.number().optional(),
  attributes: z.record(z.string(), z.unknown()).optional(),
});

export const StateResourceSchema = z.looseObject({
  mode: z.string().optional(),
  type: z.string(),
  name: z.string(),
  instances: z.array(StateInstanceSchema).default([]),
});

export const StateFileSchema = z.looseObject({
  version: z.number().optional(),
  terraform_version: z.string().optional(),
  resources: z.array(StateResourceSchema).optional(),
});

export type StateFile = z.infer<typeof StateFileSchema>;
export type StateResourceShape = z.infer<typeof StateResourceSchema>;
