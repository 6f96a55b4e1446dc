import { Request, Response } from 'express';
import { LocationJSON } from '../types';
import { normalizeLocations } from '../utils/normalizer';
import { logger } from '../utils/logger';
import { metrics } from '../utils/metrics';

export interface NormalizeLocationRequest extends Request {
  body: unknown;
}

export interface NormalizeLocationResponse {
  success: boolean;
  locations?: LocationJSON[];
  warnings?: string[][];
  error?: string;
}

/**
 * Normalizes one location payload, or a list of them, into typed locations
 */
export async function normalizeLocationHandler(
  req: NormalizeLocationRequest,
  res: Response<NormalizeLocationResponse>
): Promise<void> {
  const startTime = Date.now();

  try {
    const results = normalizeLocations(req.body);

    const response: NormalizeLocationResponse = {
      success: true,
      locations: results.map((r) => r.location.toJSON()),
      warnings: results.map((r) => r.warnings),
    };

    metrics.recordDuration(results.length, Date.now() - startTime);

    logger.info('normalize_request', {
      count: results.length,
      warningCount: results.reduce((acc, r) => acc + r.warnings.length, 0),
      processingTimeMs: Date.now() - startTime,
    });

    res.status(200).json(response);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';

    logger.error('normalize_request_error', {
      error: errorMessage,
      stack: error instanceof Error ? error.stack : undefined,
    });

    res.status(500).json({
      success: false,
      error: errorMessage,
    });
  }
}
