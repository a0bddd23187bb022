/**
 * Application Constants
 *
 * Centralized constants for magic strings and default configuration values
 * used throughout the planner.
 */

import type { PrimitiveType } from '../types/index.js';

// Schemas
export const DEFAULT_PRIMARY_KEY = 'id';
export const DEFAULT_PRIMARY_KEY_TYPE: PrimitiveType = 'id';

// Planning
export const DEFAULT_OPERATION = 'all' as const;
export const DEFAULT_PARAM_BASE = 0;
export const BULK_OPERATIONS = ['update_all', 'delete_all'] as const;

// Rendering
export const DEFAULT_BINDING_NAME = 'x';
export const RENDER_INDENT = '  ';

// Cache keys
export const CACHE_KEY_HASH_ALGORITHM = 'sha256';
