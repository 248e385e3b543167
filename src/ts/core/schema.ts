/**
 * Runtime schemas for values that cross a process or file boundary
 */

import { z } from 'zod';

/** Interface names travel into key=value records, CSV rows and shell commands */
export const INTERFACE_PATTERN = /^[A-Za-z0-9_.:-]+$/;

export const InterfaceNameSchema = z
  .string()
  .regex(INTERFACE_PATTERN, 'interface name may only contain letters, digits, and _ . : -');

const Fraction = z.number().min(0).max(1);

export const LinkMetricsSchema = z
  .object({
    signalQuality: z.number().finite(),
    latencyMs: z.number().int().nonnegative(),
    packetLoss: Fraction,
    obstructionFraction: Fraction,
    secondsToNextWindow: z.number().nonnegative().optional(),
    timestamp: z.number().int().nonnegative()
  })
  .strict();

export function isInterfaceName(value: string): boolean {
  return INTERFACE_PATTERN.test(value);
}
