/**
 * JSON form of a circuit
 */

import { z } from 'zod';

export const FORMAT_VERSION = 1;

const paramSchema = z.union([
  z.number(),
  z.object({ real: z.number(), imag: z.number() }),
]);

const bitSchema = z.tuple([z.string(), z.number().int().nonnegative()]);

export const registerSchema = z.object({
  name: z.string(),
  size: z.number().int().positive(),
  kind: z.enum(['quantum', 'classical']),
});

export const instructionSchema = z.object({
  name: z.string().min(1),
  qubits: z.array(bitSchema),
  clbits: z.array(bitSchema).default([]),
  params: z.array(paramSchema).default([]),
  condition: z
    .object({ register: z.string(), value: z.number().int().nonnegative() })
    .optional(),
});

export const circuitSchema = z.object({
  version: z.number().int().positive(),
  name: z.string().optional(),
  registers: z.array(registerSchema),
  instructions: z.array(instructionSchema),
});

export type RegisterJSON = z.infer<typeof registerSchema>;
export type InstructionJSON = z.input<typeof instructionSchema>;
export type CircuitJSON = z.input<typeof circuitSchema>;

/**
 * Human-readable summary of schema failures
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
