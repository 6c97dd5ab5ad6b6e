/**
 * Common Zod Schemas - Shared geographic types
 */

import { z } from 'zod';

// ============================================
// GeoPoint Schema
// ============================================

/**
 * A point on the globe in decimal degrees.
 */
export const GeoPointSchema = z
  .object({
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
  })
  .readonly();

export type GeoPoint = z.infer<typeof GeoPointSchema>;

// ============================================
// Zoom Level Schema
// ============================================

/** Highest zoom the tile scheme addresses */
export const MAX_ZOOM = 21;

/**
 * Integer web-map zoom level.
 */
export const ZoomLevelSchema = z
  .number()
  .int('Zoom level must be an integer')
  .min(1)
  .max(MAX_ZOOM);

// ============================================
// Country Code Schema
// ============================================

/**
 * Two-letter country code sent as the provider's `gl` parameter.
 */
export const CountryCodeSchema = z
  .string()
  .regex(/^[A-Za-z]{2}$/, 'Country code must be two letters')
  .transform((code) => code.toLowerCase());

// ============================================
// Timestamp Schema
// ============================================

export const ISO8601TimestampSchema = z.string().datetime({ message: 'Must be a valid ISO8601 timestamp' });

export type ISO8601Timestamp = z.infer<typeof ISO8601TimestampSchema>;
