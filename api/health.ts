/**
 * Health check endpoint reporting the default scheduling policy
 */
import type { VercelRequest, VercelResponse } from '@vercel/node';
import { getConfig } from '../src/utils/config.js';

export default function handler(req: VercelRequest, res: VercelResponse) {
  const { server, policy } = getConfig();
  res.status(200).json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    server: server.name,
    version: server.version,
    timezone: policy.timezone,
    method: req.method,
  });
}
