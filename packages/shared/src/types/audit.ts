// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { OptionValues } from './option.js';

// ============================================================================
// Identity
// ============================================================================

export interface UserIdentity {
  id?: string;
  name: string;
  email?: string;
  ipAddress?: string;
  userAgent?: string;
}

/** Identity used when no operator is attached, e.g. scripted runs. */
export const SYSTEM_IDENTITY: UserIdentity = { name: 'CLI' };

// ============================================================================
// Audit Entries
// ============================================================================

/**
 * One execution attempt, as handed to the audit sink.
 */
export interface AuditEntry {
  command: string;
  options: OptionValues;
  user: UserIdentity;
  exitCode: number;
  /** Plain-text output (formatting stripped) */
  output: string;
  elapsedSeconds: number;
  environment: string;
  startedAt: number;
  completedAt: number;
}

/**
 * Receives one entry per execution attempt.
 */
export interface AuditSink {
  record(entry: AuditEntry): void | Promise<void>;
}

/**
 * Retention operations over the stored execution log.
 */
export interface AuditLogStore {
  countOlderThan(cutoff: number): number;
  deleteOlderThan(cutoff: number): number;
}
