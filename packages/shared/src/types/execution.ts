// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { ChoiceOption, OptionKind, OptionValue, OptionValues } from './option.js';
import type { RiskLevel } from './risk.js';

// ============================================================================
// Execution Requests
// ============================================================================

export interface ExecutionRequest {
  commandName: string;
  options: OptionValues;
  /** The operator confirmed the prompt shown for this command */
  confirmed?: boolean;
}

export interface ExecutionResponse {
  output: string;
  exitCode: number;
  elapsedSeconds: number;
}

// ============================================================================
// Catalog
// ============================================================================

/**
 * Serializable view of a registered command for presentation layers.
 */
export interface CommandCatalogEntry {
  name: string;
  displayName: string;
  description: string;
  category: string;
  riskLevel: RiskLevel;
  requiresConfirmation: boolean;
  options: CatalogOption[];
}

export interface CatalogOption {
  key: string;
  label: string;
  kind: OptionKind;
  required: boolean;
  numeric: boolean;
  default?: OptionValue;
  choices?: ChoiceOption[];
  help?: string;
  placeholder?: string;
}
