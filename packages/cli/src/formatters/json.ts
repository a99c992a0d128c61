import {
  serializeBackendResponses,
  serializeConsensus,
  serializeCouncil,
  serializeDebate,
  serializeResponse,
} from '@crosstalk/core';
import type { Outcome } from '../outcome.js';
import type { OutputFormatter } from './formatter.js';

export function serializeOutcome(outcome: Outcome): object {
  switch (outcome.kind) {
    case 'single':
      return serializeResponse(outcome.response);
    case 'both':
      return serializeBackendResponses(outcome.responses);
    case 'consensus':
      return serializeConsensus(outcome.result);
    case 'debate':
      return serializeDebate(outcome.result);
    case 'council':
      return serializeCouncil(outcome.result);
  }
}

export class JsonFormatter implements OutputFormatter {
  async renderComplete(outcome: Outcome): Promise<void> {
    console.log(JSON.stringify(serializeOutcome(outcome), null, 2));
  }

  renderError(error: string): void {
    console.error(JSON.stringify({ error }));
  }
}
