import { Router } from 'express';
import { CallInitiationError, initiateCall, OutboundCallRequestSchema, type OutboundCallDeps } from '../calls/outboundCalls';
import { StreamRegistrationError } from '../calls/streamRegistry';
import { log } from '../log';

export interface CallsRouterDeps extends OutboundCallDeps {
  /** Bearer token for POST /v1/calls; outbound dialling is disabled without one. */
  apiToken?: string;
}

export function createCallsRouter(deps: CallsRouterDeps): Router {
  const router = Router();

  router.post('/', (req, res, next) => {
    if (!deps.apiToken) {
      res.status(503).json({ error: 'outbound_disabled' });
      return;
    }
    if (req.header('authorization') !== `Bearer ${deps.apiToken}`) {
      res.status(401).json({ error: 'unauthorized' });
      return;
    }

    const parsed = OutboundCallRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'invalid_request',
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return;
    }

    initiateCall(parsed.data, deps)
      .then((result) => {
        res.status(200).json(result);
      })
      .catch((error: unknown) => {
        if (error instanceof CallInitiationError) {
          log.warn({ event: 'outbound_call_rejected', reason: error.message, status: error.status }, 'outbound call not placed');
          res.status(error.status).json({ error: error.message });
          return;
        }
        if (error instanceof StreamRegistrationError) {
          res.status(409).json({ error: 'stream_id_conflict' });
          return;
        }
        next(error);
      });
  });

  return router;
}
