// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import {
  EnvironmentRestrictionsSchema,
  type EnvironmentRestriction,
  type RegisteredCommand,
  type RegisteredDescriptor,
  type RiskLevel,
} from '@opsdeck/shared';
import type { z } from 'zod';
import type { CommandRegistry } from './registry.js';

// ============================================================================
// Confirmation Policy
// ============================================================================

/**
 * Anything above low risk, or anything its author flagged, needs an explicit
 * confirmation before it runs.
 */
export function requiresConfirmation(riskLevel: RiskLevel, explicitConfirmation: boolean): boolean {
  return explicitConfirmation || riskLevel !== 'low';
}

// ============================================================================
// Environment Gate
// ============================================================================

export type EnvironmentRestrictionsInput = z.input<typeof EnvironmentRestrictionsSchema>;

export interface GateDecision {
  eligible: boolean;
  requiresConfirmation: boolean;
  /** Human-readable reasons behind the decision */
  reasons: string[];
}

type GatedDescriptor = Pick<RegisteredDescriptor, 'riskLevel' | 'explicitConfirmation'>;

/**
 * Decides, per environment, which commands may run and which need
 * confirmation. Environments without a restriction allow every risk level.
 */
export class EnvironmentGate {
  private readonly restrictions: Readonly<Record<string, EnvironmentRestriction>>;

  constructor(restrictions: EnvironmentRestrictionsInput = {}) {
    this.restrictions = EnvironmentRestrictionsSchema.parse(restrictions);
  }

  restrictionFor(environment: string): EnvironmentRestriction | undefined {
    return Object.prototype.hasOwnProperty.call(this.restrictions, environment)
      ? this.restrictions[environment]
      : undefined;
  }

  isEligible(descriptor: GatedDescriptor, environment: string): boolean {
    const restriction = this.restrictionFor(environment);
    return !restriction || restriction.allowedRiskLevels.includes(descriptor.riskLevel);
  }

  evaluate(descriptor: GatedDescriptor, environment: string): GateDecision {
    const restriction = this.restrictionFor(environment);

    if (!this.isEligible(descriptor, environment)) {
      return {
        eligible: false,
        requiresConfirmation: requiresConfirmation(descriptor.riskLevel, descriptor.explicitConfirmation),
        reasons: [`${descriptor.riskLevel} risk commands are not allowed in ${environment}`],
      };
    }

    const reasons: string[] = [];
    if (descriptor.riskLevel !== 'low') {
      reasons.push(`${descriptor.riskLevel} risk commands require confirmation`);
    }
    if (descriptor.explicitConfirmation) {
      reasons.push('the command asks for confirmation');
    }
    if (restriction?.disableUnlessConfirmed) {
      reasons.push(`every command in ${environment} requires confirmation`);
    }

    return { eligible: true, requiresConfirmation: reasons.length > 0, reasons };
  }

  /**
   * Registered commands that may run in the environment, in registration
   * order.
   */
  eligibleCommands(registry: CommandRegistry, environment: string): RegisteredCommand[] {
    return registry.all().filter((command) => this.isEligible(command.descriptor, environment));
  }
}
