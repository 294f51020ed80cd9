import { TriageConfig } from '../../config/triage';
import { DraftSubmission } from '../../types/models';
import { DomainValidator } from '../domain/DomainValidator';
import { draftRecipients } from '../guardrails/types';

/**
 * Drafts that cannot be approved as written: nobody to send to, an address
 * that does not parse, or nothing to say
 */
export class ClarificationDetector {
  private readonly validator: DomainValidator;

  constructor(config: TriageConfig) {
    this.validator = new DomainValidator(config.domains);
  }

  questionsFor(draft: DraftSubmission): string[] {
    const questions: string[] = [];
    const recipients = draftRecipients(draft);

    if (recipients.length === 0) {
      questions.push('Who should receive this reply?');
    }
    for (const recipient of recipients) {
      if (!this.validator.parseAddress(recipient)) {
        questions.push(`"${recipient}" is not a valid address. Which address did you mean?`);
      }
    }
    if (!draft.body || draft.body.trim().length === 0) {
      questions.push('The draft is empty. What should the reply say?');
    }

    return questions;
  }
}
