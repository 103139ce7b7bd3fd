/**
 * qcstore calculation specifications
 *
 * - Canonical encoding and SHA-256 digests
 * - Projection of specs onto templates
 * - Named hash schemes (full, minimal, user-registered)
 */

export * from './errors';
export * from './canonical';
export * from './calculation';
export * from './projection';
export * from './hash-registry';
