import { Router } from 'express';
import { get_pool } from '../db/index.js';

const router = Router();

router.get('/health', async (req, res) => {
  try {
    await get_pool().query('SELECT 1');
    res.json({ status: 'ok', database: 'connected' });
  } catch (err) {
    req.log.warn('health check failed', { error: String(err) });
    res.status(503).json({ status: 'error', database: 'disconnected' });
  }
});

export default router;
