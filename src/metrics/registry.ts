/**
 * Central Metrics Registry
 *
 * Single source of truth for the prom-client Registry.
 * This module has no dependencies on other metrics modules to avoid circular imports.
 */

import { Registry } from 'prom-client';

export const metricsRegistry = new Registry();
