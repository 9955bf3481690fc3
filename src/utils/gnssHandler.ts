import type { FixOutcome } from "../services/navigationService";
import type { GnssTopic, MessageMeta, RawFixPayload } from "../types";
import { parseFixPayload } from "./fix";

type GnssHandlerOptions = {
  ingestFix: (raw: RawFixPayload, source?: string) => FixOutcome;
  onOutcome?: (outcome: FixOutcome, topic: GnssTopic, meta: MessageMeta) => void;
};

/**
 * Decodes one MQTT message into a fix. Invalid JSON throws; range checks
 * are the feed's job and come back as a rejected outcome.
 */
export function createGnssHandler(options: GnssHandlerOptions) {
  return function handleGnssMessage(
    topic: GnssTopic,
    topicText: string,
    payload: Buffer,
    meta: MessageMeta,
  ): FixOutcome {
    const raw = parseFixPayload(payload);
    const outcome = options.ingestFix(raw, topicText);
    options.onOutcome?.(outcome, topic, meta);
    return outcome;
  };
}
