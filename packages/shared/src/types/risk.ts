// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';

// ============================================================================
// Risk Levels
// ============================================================================

/**
 * Risk classification of a command.
 * - low: read-only or otherwise safe operations
 * - medium: may modify data, usually reversible
 * - high: critical operations that can lose data or cause downtime
 */
export const RiskLevelSchema = z.enum(['low', 'medium', 'high']);
export type RiskLevel = z.infer<typeof RiskLevelSchema>;

// ============================================================================
// Environment Restrictions
// ============================================================================

export const EnvironmentRestrictionSchema = z.object({
  /** Risk levels that may run in this environment */
  allowedRiskLevels: z.array(RiskLevelSchema),
  /** Every eligible command needs explicit confirmation here */
  disableUnlessConfirmed: z.boolean().default(false),
});

export type EnvironmentRestriction = z.infer<typeof EnvironmentRestrictionSchema>;

export const EnvironmentRestrictionsSchema = z.record(z.string(), EnvironmentRestrictionSchema);
export type EnvironmentRestrictions = z.infer<typeof EnvironmentRestrictionsSchema>;
