/**
 * Core Ports
 *
 * Ports define the boundaries between the comparison domain and the
 * adapters that touch the filesystem and external processes.
 */

export * from './inventory-provider.js';
export * from './specification-provider.js';
export * from './line-differ.js';
