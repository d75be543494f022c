// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

export * from './types/index.js';
export * from './errors/index.js';
export * from './utils/index.js';
export * from './logging/index.js';
