import { EmailMessage } from '../../types/models';
import { PromptGuard } from '../security/PromptGuard';
import { FilteringPipeline } from '../filter/FilteringPipeline';

/**
 * Zero-trust entry point for provider messages: injection screening,
 * then relevance filtering
 */
export class IngestionGate {
  constructor(
    private readonly guard: PromptGuard,
    private readonly pipeline: FilteringPipeline
  ) {}

  /**
   * Drops messages whose subject or body trips the prompt guard
   */
  screen(messages: EmailMessage[]): EmailMessage[] {
    return messages.filter(message => {
      if (this.guard.validate(`${message.subject} ${message.body}`)) {
        return true;
      }
      console.warn(`🛡️ [SECURITY] Dropped email "${message.subject.slice(0, 30)}..." (${message.id}) at ingestion`);
      return false;
    });
  }

  async classify(messages: EmailMessage[]): Promise<EmailMessage[]> {
    return this.pipeline.filter(messages);
  }

  /**
   * screen() followed by classify(); returns the relevant messages in provider order
   */
  async admit(messages: EmailMessage[]): Promise<EmailMessage[]> {
    return this.classify(this.screen(messages));
  }
}
