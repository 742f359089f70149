/**
 * ================================================================================
 * SERVICES MODULE - Core Service Layer Exports
 * ================================================================================
 *
 * EXPORTED SERVICES:
 * • InstanceInventoryService - Multi-region collection and normalization
 * • ConfigService - Configuration resolution and credential validation
 *
 * USAGE:
 * import { InstanceInventoryService, ConfigService } from '../services';
 *
 * @version 1.0.0
 * @since 2025
 * @license BSD-3-Clause
 */

// Multi-region collection
export * from './inventory';

// Configuration Management Service
export * from './config';
