// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

export * from './risk.js';
export * from './option.js';
export * from './command.js';
export * from './audit.js';
export * from './execution.js';
