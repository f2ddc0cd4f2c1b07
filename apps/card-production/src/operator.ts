import {
  LogDispositionStandardTypes,
  LogEventId,
  Logger,
} from '@cardprod/logging';
import { ReinsertPrompt } from './tools/types';

export const REINSERT_CARD_MESSAGE = 'Please remove the card and re-insert it';

/**
 * Builds the prompt shown after a fresh install. It doesn't wait for an
 * answer: the tool that runs next waits for the card to come back.
 */
export function createReinsertPrompt({
  logger,
  write = (text) => process.stderr.write(text),
}: {
  logger: Logger;
  write?: (text: string) => void;
}): ReinsertPrompt {
  return async () => {
    await logger.log(LogEventId.OperatorPrompt, 'system', {
      message: REINSERT_CARD_MESSAGE,
      disposition: LogDispositionStandardTypes.NotApplicable,
    });
    write(`\n\n${REINSERT_CARD_MESSAGE}\n\n`);
  };
}
