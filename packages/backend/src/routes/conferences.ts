import { Router } from 'express';
import { require_api_key } from '../middleware/auth.js';
import { NotFoundError, is_unique_violation } from '../lib/errors.js';
import { create_conference, update_email_settings } from '../services/conferences.js';
import { list_pending_notifications } from '../services/notifications.js';
import {
  create_conference_schema,
  update_email_settings_schema,
  conference_param_schema,
} from '../schemas/cfps.js';

const router = Router();

// Create conference with its program and email settings
router.post('/conferences', require_api_key, async (req, res) => {
  try {
    const body_result = create_conference_schema.safeParse(req.body);
    if (!body_result.success) {
      req.log.warn('conferences/create validation failed', { issues: body_result.error.issues });
      res.status(400).json({ error: 'Invalid request body', details: body_result.error.issues });
      return;
    }

    const context = await create_conference(body_result.data);
    res.status(201).json({
      conference: context.conference,
      program: context.program,
      email_settings: context.email_settings,
    });
  } catch (err) {
    if (is_unique_violation(err)) {
      req.log.info('conferences/create short title taken', { short_title: req.body?.short_title });
      res.status(409).json({ error: 'A conference with this short title already exists' });
      return;
    }
    req.log.error('conferences/create unexpected error', {
      error: String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    res.status(500).json({ error: 'Internal server error' });
  }
});

// Update email settings
router.put('/conferences/:conference_id/email-settings', require_api_key, async (req, res) => {
  try {
    const param_result = conference_param_schema.safeParse(req.params);
    if (!param_result.success) {
      req.log.warn('conferences/email_settings validation failed', { params: req.params });
      res.status(400).json({ error: 'Invalid conference ID' });
      return;
    }

    const body_result = update_email_settings_schema.safeParse(req.body);
    if (!body_result.success) {
      req.log.warn('conferences/email_settings body validation failed', { issues: body_result.error.issues });
      res.status(400).json({ error: 'Invalid request body', details: body_result.error.issues });
      return;
    }

    const email_settings = await update_email_settings(param_result.data.conference_id, body_result.data);
    res.json({ email_settings });
  } catch (err) {
    if (err instanceof NotFoundError) {
      res.status(404).json({ error: err.message });
      return;
    }
    req.log.error('conferences/email_settings unexpected error', {
      error: String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    res.status(500).json({ error: 'Internal server error' });
  }
});

// Emails waiting for delivery
router.get('/conferences/:conference_id/notifications', require_api_key, async (req, res) => {
  try {
    const param_result = conference_param_schema.safeParse(req.params);
    if (!param_result.success) {
      res.status(400).json({ error: 'Invalid conference ID' });
      return;
    }

    const notifications = await list_pending_notifications(param_result.data.conference_id);
    res.json({ notifications });
  } catch (err) {
    req.log.error('conferences/notifications unexpected error', {
      error: String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    res.status(500).json({ error: 'Internal server error' });
  }
});

export default router;
