import { Request, Response } from 'express';
import { AnswerPipeline } from '../services/answer/AnswerPipeline';
import { IngestionGate } from '../services/sync/IngestionGate';
import { MailProvider } from '../services/email/MailProvider';
import { validateAskRequest, validateRelevantEmailsQuery, validateSummaryQuery } from '../models/validation';

/**
 * AssistantController handles question answering, summaries and the
 * relevant-emails listing
 */
export class AssistantController {
  constructor(
    private answers: AnswerPipeline,
    private gate: IngestionGate,
    private provider: MailProvider,
    private providerQuery: string
  ) {}

  /**
   * POST /api/ask - Answer a question from the indexed mail
   */
  async ask(req: Request, res: Response): Promise<void> {
    const { error, value } = validateAskRequest(req.body);
    if (error || !value) {
      res.status(400).json({
        error: 'Invalid request',
        message: error ? error.message : 'question is required'
      });
      return;
    }

    if (!this.answers.isGenerationEnabled) {
      res.status(503).json({
        error: 'Service unavailable',
        message: 'Answer generation is not configured'
      });
      return;
    }

    try {
      const result = await this.answers.answer(value.question, value.context);
      res.json({
        question: value.question,
        answer: result.answer,
        sources: result.sources
      });
    } catch (error) {
      console.error('❌ Failed to answer question:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to answer question'
      });
    }
  }

  /**
   * GET /api/email-summary?days=7
   */
  async getSummary(req: Request, res: Response): Promise<void> {
    const { error, value } = validateSummaryQuery(req.query);
    if (error || !value) {
      res.status(400).json({
        error: 'Invalid days parameter',
        message: error ? error.message : 'days must be an integer'
      });
      return;
    }

    if (!this.answers.isGenerationEnabled) {
      res.status(503).json({
        error: 'Service unavailable',
        message: 'Answer generation is not configured'
      });
      return;
    }

    try {
      const summary = await this.answers.summarize(value.days);
      res.json({ days: value.days, summary });
    } catch (error) {
      console.error('❌ Failed to summarize emails:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to summarize emails'
      });
    }
  }

  /**
   * GET /api/relevant-emails?limit=20 - Latest provider page, screened and
   * filtered, in provider order
   */
  async getRelevantEmails(req: Request, res: Response): Promise<void> {
    const { error, value } = validateRelevantEmailsQuery(req.query);
    if (error || !value) {
      res.status(400).json({
        error: 'Invalid limit parameter',
        message: error ? error.message : 'limit must be between 1 and 100'
      });
      return;
    }

    if (!this.provider.isAuthenticated()) {
      res.status(401).json({
        error: 'Not authenticated',
        message: 'Mail provider is not authenticated'
      });
      return;
    }

    try {
      const page = await this.provider.fetchPage(this.providerQuery, undefined, value.limit * 2);
      const relevant = await this.gate.admit(page.messages);
      res.json(relevant.slice(0, value.limit));
    } catch (error) {
      console.error('❌ Failed to list relevant emails:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to retrieve relevant emails'
      });
    }
  }
}
