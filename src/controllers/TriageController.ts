import { Request, Response } from 'express';
import { TriageService } from '../services/triage/TriageService';
import { BatchSizeError } from '../services/triage/TriagePipeline';
import {
  ValidationError, throwValidationError, validateGuardrailCheckRequest, validateTriageRequest
} from '../models/validation';
import {
  draftInputToSubmission, draftInputsToSubmissions, emailInputToRecord, metricsToResponse,
  queueToResponse, triageResultToResponse, verdictToResponse
} from '../models/transformers';
import { TriageConfig } from '../config/triage';

/**
 * TriageController handles HTTP requests for batch triage and draft checks
 */
export class TriageController {
  constructor(
    private triageService: TriageService,
    private config: TriageConfig
  ) {}

  /**
   * POST /api/triage - Phase one: classify, score, categorize and route a batch
   */
  async triage(req: Request, res: Response): Promise<void> {
    try {
      const validation = validateTriageRequest(req.body);
      if (validation.error || !validation.value) {
        throwValidationError(validation);
      }
      const request = validation.value;

      const run = await this.triageService.triage(
        request.emails.map(emailInputToRecord),
        { allowOversizedBatch: request.allow_oversized_batch }
      );

      res.json({
        batch_id: run.batchId,
        started_at: run.startedAt.toISOString(),
        completed_at: run.completedAt.toISOString(),
        reinjected: run.reinjected,
        deferred_stored: run.deferredStored,
        ...triageResultToResponse(run.result)
      });
    } catch (error) {
      this.handleError(res, error, 'Triage failed');
    }
  }

  /**
   * POST /api/triage/run - Both phases, with drafts keyed by message id
   */
  async run(req: Request, res: Response): Promise<void> {
    try {
      const validation = validateTriageRequest(req.body);
      if (validation.error || !validation.value) {
        throwValidationError(validation);
      }
      const request = validation.value;

      const run = await this.triageService.run(
        request.emails.map(emailInputToRecord),
        draftInputsToSubmissions(request.drafts),
        { allowOversizedBatch: request.allow_oversized_batch }
      );

      res.json({
        batch_id: run.batchId,
        started_at: run.startedAt.toISOString(),
        completed_at: run.completedAt.toISOString(),
        reinjected: run.reinjected,
        deferred_stored: run.deferredStored,
        queue: queueToResponse(run.outcome.queue),
        metrics: metricsToResponse(run.outcome.metrics)
      });
    } catch (error) {
      this.handleError(res, error, 'Triage run failed');
    }
  }

  /**
   * POST /api/guardrails/check - Check a single draft before sending
   */
  async checkGuardrails(req: Request, res: Response): Promise<void> {
    try {
      const validation = validateGuardrailCheckRequest(req.body);
      if (validation.error || !validation.value) {
        throwValidationError(validation);
      }
      const request = validation.value;
      const draft = draftInputToSubmission(request.draft);

      const verdict = this.triageService.checkDraft(draft, {
        messageId: request.message_id,
        category: request.category
      });

      res.json({
        draft_id: draft.draftId,
        ...verdictToResponse(verdict),
        clarification_questions: this.triageService.clarificationQuestions(draft)
      });
    } catch (error) {
      this.handleError(res, error, 'Guardrail check failed');
    }
  }

  /**
   * GET /api/triage/deferred - Mail currently held back by Do-Not-Disturb
   */
  async listDeferred(req: Request, res: Response): Promise<void> {
    try {
      const records = await this.triageService.listDeferred();
      res.json({
        count: records.length,
        deferred: records.map(record => ({
          message_id: record.messageId,
          thread_id: record.threadId,
          sender: record.sender,
          subject: record.subject,
          received_at: record.receivedAt.toISOString()
        }))
      });
    } catch (error) {
      this.handleError(res, error, 'Failed to list deferred mail');
    }
  }

  /**
   * GET /api/config - Effective thresholds, domain lists and toggles
   */
  async getConfig(req: Request, res: Response): Promise<void> {
    res.json({
      priority_threshold: this.config.priorityThreshold,
      medium_threshold: this.config.mediumThreshold,
      max_batch_size: this.config.maxBatchSize,
      top_n: this.config.topN,
      domains: {
        vip_addresses: this.config.domains.vipAddresses,
        vip_domains: this.config.domains.vipDomains,
        internal_domains: this.config.domains.internalDomains,
        allowed_domains: this.config.domains.allowedDomains,
        blocked_domains: this.config.domains.blockedDomains
      },
      dnd: {
        enabled: this.config.dnd.enabled,
        urgency_override_score: this.config.dnd.urgencyOverrideScore
      },
      guardrails: this.config.guardrails.enabled
    });
  }

  private handleError(res: Response, error: unknown, message: string): void {
    if (error instanceof ValidationError) {
      res.status(400).json({
        error: 'Invalid request',
        message: error.message,
        details: error.details.map(detail => detail.message)
      });
      return;
    }

    if (error instanceof BatchSizeError) {
      res.status(413).json({
        error: 'Batch too large',
        message: error.message,
        limit: error.limit
      });
      return;
    }

    console.error(`${message}:`, error);
    res.status(500).json({
      error: 'Internal server error',
      message
    });
  }
}
