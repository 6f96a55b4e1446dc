import * as functions from 'firebase-functions';
import { normalizeLocationHandler } from './functions/normalizeLocation';
import { adaptLocationErrorHandler } from './functions/adaptLocationError';

/**
 * POST /normalizeLocation
 * Body: a raw location payload, or an array of them. Any shape is accepted;
 * missing or mistyped fields resolve to their sentinel values.
 */
export const normalizeLocation = functions.https.onRequest(async (req, res) => {
  if (req.method !== 'POST') {
    res.status(405).json({ error: 'Method not allowed' });
    return;
  }

  await normalizeLocationHandler(req, res);
});

/**
 * POST /adaptLocationError
 * Body:
 *   - code: string (integer-encoded, required)
 *   - message?: string
 */
export const adaptLocationError = functions.https.onRequest(async (req, res) => {
  if (req.method !== 'POST') {
    res.status(405).json({ error: 'Method not allowed' });
    return;
  }

  await adaptLocationErrorHandler(req, res);
});
