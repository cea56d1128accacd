import { Router, type Request, type Response } from 'express';
import { require_api_key } from '../middleware/auth.js';
import { CfpValidationError, NotFoundError } from '../lib/errors.js';
import {
  list_cfps,
  create_cfp,
  update_cfp,
  delete_cfp,
  get_cfp_status,
} from '../services/cfps.js';
import {
  create_cfp_schema,
  update_cfp_schema,
  uuid_param_schema,
  conference_param_schema,
} from '../schemas/cfps.js';

const router = Router();

function handle_error(route: string, req: Request, res: Response, err: unknown): void {
  if (err instanceof NotFoundError) {
    res.status(404).json({ error: err.message });
    return;
  }
  if (err instanceof CfpValidationError) {
    req.log.info(`${route} rejected`, { errors: err.errors });
    res.status(422).json({ error: 'Cfp is invalid', errors: err.errors });
    return;
  }
  req.log.error(`${route} unexpected error`, {
    error: String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json({ error: 'Internal server error' });
}

// List a conference's cfps with the per-type lookups
router.get('/conferences/:conference_id/cfps', require_api_key, async (req, res) => {
  try {
    const param_result = conference_param_schema.safeParse(req.params);
    if (!param_result.success) {
      req.log.warn('cfps/list validation failed', { params: req.params });
      res.status(400).json({ error: 'Invalid conference ID' });
      return;
    }

    const result = await list_cfps(param_result.data.conference_id);
    res.json(result);
  } catch (err) {
    handle_error('cfps/list', req, res, err);
  }
});

// Create cfp
router.post('/conferences/:conference_id/cfps', require_api_key, async (req, res) => {
  try {
    const param_result = conference_param_schema.safeParse(req.params);
    if (!param_result.success) {
      req.log.warn('cfps/create validation failed', { params: req.params });
      res.status(400).json({ error: 'Invalid conference ID' });
      return;
    }

    const body_result = create_cfp_schema.safeParse(req.body);
    if (!body_result.success) {
      req.log.warn('cfps/create body validation failed', { issues: body_result.error.issues });
      res.status(400).json({ error: 'Invalid request body', details: body_result.error.issues });
      return;
    }

    const cfp = await create_cfp(param_result.data.conference_id, body_result.data);
    res.status(201).json({ cfp });
  } catch (err) {
    handle_error('cfps/create', req, res, err);
  }
});

// Get cfp with its openness
router.get('/cfps/:id', require_api_key, async (req, res) => {
  try {
    const param_result = uuid_param_schema.safeParse(req.params);
    if (!param_result.success) {
      req.log.warn('cfps/get validation failed', { params: req.params });
      res.status(400).json({ error: 'Invalid cfp ID' });
      return;
    }

    const status = await get_cfp_status(param_result.data.id);
    res.json(status);
  } catch (err) {
    handle_error('cfps/get', req, res, err);
  }
});

// Update cfp
router.put('/cfps/:id', require_api_key, async (req, res) => {
  try {
    const param_result = uuid_param_schema.safeParse(req.params);
    if (!param_result.success) {
      req.log.warn('cfps/update validation failed', { params: req.params });
      res.status(400).json({ error: 'Invalid cfp ID' });
      return;
    }

    const body_result = update_cfp_schema.safeParse(req.body);
    if (!body_result.success) {
      req.log.warn('cfps/update body validation failed', { issues: body_result.error.issues });
      res.status(400).json({ error: 'Invalid request body', details: body_result.error.issues });
      return;
    }

    const result = await update_cfp(param_result.data.id, body_result.data);
    res.json(result);
  } catch (err) {
    handle_error('cfps/update', req, res, err);
  }
});

// Delete cfp
router.delete('/cfps/:id', require_api_key, async (req, res) => {
  try {
    const param_result = uuid_param_schema.safeParse(req.params);
    if (!param_result.success) {
      req.log.warn('cfps/delete validation failed', { params: req.params });
      res.status(400).json({ error: 'Invalid cfp ID' });
      return;
    }

    const deleted = await delete_cfp(param_result.data.id);
    if (!deleted) {
      res.status(404).json({ error: 'Cfp not found' });
      return;
    }

    res.json({ success: true });
  } catch (err) {
    handle_error('cfps/delete', req, res, err);
  }
});

export default router;
