/**
 * Configuration barrel export.
 */

export * from './SessionConfig';
export * from './ThumbnailConfig';
