import { ClassificationVerdict, EmailMessage } from '../../types/models';
import { RelevanceClassifier } from './RelevanceClassifier';
import { SpamClassifier, buildSpamInput } from '../ml/SpamClassifier';

export type StageOrder = 'heuristics-first' | 'ml-first' | 'combined';

export interface FilteringOptions {
  stageOrder?: StageOrder;
  batchSize?: number;
  debug?: boolean;
}

/**
 * Combines the heuristic relevance chain with the ML spam stage.
 * Sender-VIP messages bypass both spam checks. ML failures are fail-open.
 */
export class FilteringPipeline {
  private readonly stageOrder: StageOrder;
  private readonly batchSize: number;
  private readonly debug: boolean;
  private mlFailures = 0;

  constructor(
    private readonly classifier: RelevanceClassifier,
    private readonly spamClassifier: SpamClassifier | null,
    options: FilteringOptions = {}
  ) {
    this.stageOrder = options.stageOrder || 'heuristics-first';
    this.batchSize = options.batchSize || 5;
    this.debug = options.debug || false;

    if (!spamClassifier) {
      console.warn('⚠️ [FILTER] Spam model not configured, ML spam stage disabled');
    }
  }

  get isSpamStageEnabled(): boolean {
    return this.spamClassifier !== null;
  }

  /**
   * Decides relevance for a single message
   */
  async evaluate(email: EmailMessage): Promise<ClassificationVerdict> {
    if (this.classifier.isVipSender(email)) {
      return this.classifier.classify(email);
    }

    switch (this.stageOrder) {
      case 'ml-first': {
        const mlSpam = await this.checkSpam(email);
        if (mlSpam === true) {
          return this.spamVerdict();
        }
        return { ...this.classifier.classify(email), mlSpam };
      }

      case 'combined': {
        const heuristic = this.classifier.classify(email);
        const mlSpam = await this.checkSpam(email);
        if (heuristic.relevant && mlSpam === true) {
          return this.spamVerdict();
        }
        return { ...heuristic, mlSpam };
      }

      case 'heuristics-first':
      default: {
        const heuristic = this.classifier.classify(email);
        if (!heuristic.relevant) {
          return heuristic;
        }
        const mlSpam = await this.checkSpam(email);
        if (mlSpam === true) {
          return this.spamVerdict();
        }
        return { ...heuristic, mlSpam };
      }
    }
  }

  /**
   * Classifies a page of messages in order, sets isRelevant on each and
   * returns the relevant ones
   */
  async filter(emails: EmailMessage[]): Promise<EmailMessage[]> {
    const relevant: EmailMessage[] = [];

    for (let i = 0; i < emails.length; i += this.batchSize) {
      const batch = emails.slice(i, i + this.batchSize);
      const verdicts = await Promise.all(batch.map(email => this.evaluate(email)));

      batch.forEach((email, index) => {
        const verdict = verdicts[index];
        email.isRelevant = verdict.relevant;

        if (this.debug) {
          console.log(`🔍 [FILTER] ${email.id} ${verdict.relevant ? 'kept' : 'dropped'} (${verdict.stage}): ${verdict.reason}`);
        }

        if (verdict.relevant) {
          relevant.push(email);
        }
      });
    }

    return relevant;
  }

  get mlFailureCount(): number {
    return this.mlFailures;
  }

  /**
   * true = spam, false = ham or classifier failure, undefined = stage disabled
   */
  private async checkSpam(email: EmailMessage): Promise<boolean | undefined> {
    if (!this.spamClassifier) {
      return undefined;
    }

    try {
      const label = await this.spamClassifier.classify(buildSpamInput(email));
      return label === 'spam';
    } catch (error) {
      this.mlFailures++;
      console.warn(`⚠️ [FILTER] Spam check failed for ${email.id}, treating as not spam:`, error instanceof Error ? error.message : error);
      return false;
    }
  }

  private spamVerdict(): ClassificationVerdict {
    return { relevant: false, stage: 'ml_spam', reason: 'Flagged as spam by the ML classifier', mlSpam: true };
  }
}
