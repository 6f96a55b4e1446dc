import { Request, Response } from 'express';
import { InvalidErrorCodeError } from '../models';
import { LocationErrorJSON } from '../types';
import { adaptLocationError } from '../utils/normalizer';
import { logger } from '../utils/logger';

export interface AdaptLocationErrorRequest extends Request {
  body: unknown;
}

export interface AdaptLocationErrorResponse {
  success: boolean;
  error?: LocationErrorJSON | string;
}

/**
 * Converts a platform `{ code, message }` error signal into a typed LocationError
 */
export async function adaptLocationErrorHandler(
  req: AdaptLocationErrorRequest,
  res: Response<AdaptLocationErrorResponse>
): Promise<void> {
  try {
    const locationError = adaptLocationError(req.body);

    logger.info('location_error_adapted', {
      code: locationError.code,
      message: locationError.message,
    });

    res.status(200).json({
      success: true,
      error: locationError.toJSON(),
    });
  } catch (error) {
    if (error instanceof InvalidErrorCodeError) {
      res.status(400).json({
        success: false,
        error: error.message,
      });
      return;
    }

    const errorMessage = error instanceof Error ? error.message : 'Unknown error';

    logger.error('location_error_adapt_failed', {
      error: errorMessage,
      stack: error instanceof Error ? error.stack : undefined,
    });

    res.status(500).json({
      success: false,
      error: errorMessage,
    });
  }
}
