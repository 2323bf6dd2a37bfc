/**
 * Unit tests for FilteringPipeline stage composition
 */

import { FilteringPipeline } from '../../../services/filter/FilteringPipeline';
import { RelevanceClassifier } from '../../../services/filter/RelevanceClassifier';
import { SpamClassifier, SpamLabel } from '../../../services/ml/SpamClassifier';
import { buildEmail } from '../../helpers/buildEmail';

describe('FilteringPipeline', () => {
  const now = new Date('2024-06-01T12:00:00Z');
  let classifier: RelevanceClassifier;
  let spam: { classify: jest.Mock<Promise<SpamLabel>, [string]> };

  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    classifier = new RelevanceClassifier({ vipSenders: ['ceo@corp.example'], now: () => now });
    spam = { classify: jest.fn<Promise<SpamLabel>, [string]>().mockResolvedValue('ham') };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const asSpamClassifier = (mock: typeof spam): SpamClassifier => mock;

  describe('heuristics-first', () => {
    it('should run the ML stage only on heuristic admits', async () => {
      const pipeline = new FilteringPipeline(classifier, asSpamClassifier(spam));

      const rejected = await pipeline.evaluate(buildEmail({ subject: 'Big discount' }));
      const admitted = await pipeline.evaluate(buildEmail({ subject: 'Project update', body: 'See notes' }));

      expect(rejected.stage).toBe('heuristic_spam');
      expect(admitted).toEqual({
        relevant: true,
        stage: 'content_qualifier',
        reason: 'Subject contains important keyword "project"',
        mlSpam: false
      });
      expect(spam.classify).toHaveBeenCalledTimes(1);
      expect(spam.classify).toHaveBeenCalledWith('Subject: Project update\n\nSee notes');
    });

    it('should reject messages the model flags as spam', async () => {
      spam.classify.mockResolvedValue('spam');
      const pipeline = new FilteringPipeline(classifier, asSpamClassifier(spam));

      const verdict = await pipeline.evaluate(buildEmail({ subject: 'Project update' }));

      expect(verdict).toEqual({
        relevant: false,
        stage: 'ml_spam',
        reason: 'Flagged as spam by the ML classifier',
        mlSpam: true
      });
    });

    it('should truncate the body to 512 characters for the model', async () => {
      const pipeline = new FilteringPipeline(classifier, asSpamClassifier(spam));
      const body = 'a'.repeat(600);

      await pipeline.evaluate(buildEmail({ subject: 'Meeting', body }));

      expect(spam.classify).toHaveBeenCalledWith(`Subject: Meeting\n\n${'a'.repeat(512)}`);
    });

    it('should fail open when the model errors', async () => {
      spam.classify.mockRejectedValue(new Error('model offline'));
      const pipeline = new FilteringPipeline(classifier, asSpamClassifier(spam));

      const verdict = await pipeline.evaluate(buildEmail({ subject: 'Meeting notes' }));

      expect(verdict.relevant).toBe(true);
      expect(verdict.mlSpam).toBe(false);
      expect(pipeline.mlFailureCount).toBe(1);
      expect(console.warn).toHaveBeenCalled();
    });
  });

  describe('VIP senders', () => {
    it('should bypass the ML stage entirely', async () => {
      spam.classify.mockResolvedValue('spam');
      const pipeline = new FilteringPipeline(classifier, asSpamClassifier(spam), { stageOrder: 'ml-first' });

      const verdict = await pipeline.evaluate(buildEmail({ sender: 'ceo@corp.example', subject: 'Sale offer' }));

      expect(verdict.relevant).toBe(true);
      expect(verdict.stage).toBe('vip_sender');
      expect(spam.classify).not.toHaveBeenCalled();
    });
  });

  describe('ml-first', () => {
    it('should classify every non-VIP message before heuristics', async () => {
      const pipeline = new FilteringPipeline(classifier, asSpamClassifier(spam), { stageOrder: 'ml-first' });

      const verdict = await pipeline.evaluate(buildEmail({ subject: 'Big discount' }));

      expect(spam.classify).toHaveBeenCalledTimes(1);
      expect(verdict.stage).toBe('heuristic_spam');
      expect(verdict.mlSpam).toBe(false);
    });

    it('should short-circuit on spam', async () => {
      spam.classify.mockResolvedValue('spam');
      const pipeline = new FilteringPipeline(classifier, asSpamClassifier(spam), { stageOrder: 'ml-first' });

      const verdict = await pipeline.evaluate(buildEmail({ subject: 'Meeting' }));

      expect(verdict.stage).toBe('ml_spam');
    });
  });

  describe('combined', () => {
    it('should record the ML verdict alongside a heuristic rejection', async () => {
      spam.classify.mockResolvedValue('spam');
      const pipeline = new FilteringPipeline(classifier, asSpamClassifier(spam), { stageOrder: 'combined' });

      const verdict = await pipeline.evaluate(buildEmail({ subject: 'Newsletter #4' }));

      expect(verdict.relevant).toBe(false);
      expect(verdict.stage).toBe('heuristic_spam');
      expect(verdict.mlSpam).toBe(true);
    });
  });

  describe('without a spam model', () => {
    it('should warn once and rely on heuristics', async () => {
      const pipeline = new FilteringPipeline(classifier, null);

      const verdict = await pipeline.evaluate(buildEmail({ subject: 'Meeting' }));

      expect(pipeline.isSpamStageEnabled).toBe(false);
      expect(console.warn).toHaveBeenCalledWith('⚠️ [FILTER] Spam model not configured, ML spam stage disabled');
      expect(verdict.relevant).toBe(true);
      expect(verdict.mlSpam).toBeUndefined();
    });
  });

  describe('filter', () => {
    it('should mark messages and return the relevant ones in order', async () => {
      const pipeline = new FilteringPipeline(classifier, asSpamClassifier(spam), { batchSize: 2 });
      const emails = [
        buildEmail({ id: 'a', subject: 'Meeting' }),
        buildEmail({ id: 'b', subject: 'Sale today' }),
        buildEmail({ id: 'c', subject: 'RE: QA Sign-off' })
      ];

      const relevant = await pipeline.filter(emails);

      expect(relevant.map(e => e.id)).toEqual(['a', 'c']);
      expect(emails.map(e => e.isRelevant)).toEqual([true, false, true]);
    });
  });
});
