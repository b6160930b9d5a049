/**
 * @ican/contracts
 *
 * TypeScript interfaces and types for ICAN specifications, registry data
 * and validation results. This package has zero runtime dependencies.
 *
 * @packageDocumentation
 */

// Core types
export * from './core/character-class.js';
export * from './core/crypto-variant.js';
export * from './core/specification.js';

// Results
export * from './execution/result.js';
