/**
 * Inspiration Store - Data Models
 *
 * Barrel export for all model interfaces.
 */

export * from './theme.js';

export * from './inspiration.js';
