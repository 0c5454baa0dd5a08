import type { RoutingDecision } from "../types.js";
import type { RoutingConfig } from "./config.js";

export type IntentRouter = {
  route(utterance: string): RoutingDecision;
};

type CompiledSignal = {
  phrase: string;
  tokens: string[];
};

type CompiledDestination = {
  id: string;
  label: string;
  signals: CompiledSignal[];
};

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean);
}

function containsSequence(tokens: string[], needle: string[]): boolean {
  if (!needle.length || needle.length > tokens.length) {
    return false;
  }
  for (let i = 0; i + needle.length <= tokens.length; i += 1) {
    if (needle.every((token, offset) => tokens[i + offset] === token)) {
      return true;
    }
  }
  return false;
}

function compile(config: RoutingConfig): CompiledDestination[] {
  return config.destinations.map((destination) => {
    const seen = new Set<string>();
    const signals: CompiledSignal[] = [];
    for (const raw of destination.signals) {
      const tokens = tokenize(raw);
      const phrase = tokens.join(" ");
      if (!tokens.length || seen.has(phrase)) {
        continue;
      }
      seen.add(phrase);
      signals.push({ phrase, tokens });
    }
    return { id: destination.id, label: destination.label, signals };
  });
}

function tieRank(order: string[], id: string): number {
  const index = order.indexOf(id);
  return index === -1 ? order.length : index;
}

/**
 * Classifies utterances by counting the distinct trigger phrases each
 * destination matches. The strictly highest count wins; ties go to the
 * earliest destination in `tieBreakOrder`, then to configuration order.
 * No match anywhere routes to the general destination.
 */
export function createIntentRouter(config: RoutingConfig): IntentRouter {
  const destinations = compile(config);

  function route(utterance: string): RoutingDecision {
    const tokens = tokenize(utterance);
    const scores: Record<string, number> = {};
    const matches = new Map<string, string[]>();

    for (const destination of destinations) {
      const matched = destination.signals
        .filter((signal) => containsSequence(tokens, signal.tokens))
        .map((signal) => signal.phrase);
      scores[destination.id] = matched.length;
      matches.set(destination.id, matched);
    }

    const total = Object.values(scores).reduce((sum, value) => sum + value, 0);
    if (total === 0) {
      return Object.freeze({
        destination: config.generalDestination,
        matchedSignals: Object.freeze([]),
        scores: Object.freeze(scores),
        confidence: 0,
        reason: "No routing signals matched; sent to the general destination."
      });
    }

    const ranked = destinations
      .map((destination, position) => ({ destination, position }))
      .sort((a, b) => {
        const byScore = scores[b.destination.id] - scores[a.destination.id];
        if (byScore !== 0) {
          return byScore;
        }
        const byTie =
          tieRank(config.tieBreakOrder, a.destination.id) -
          tieRank(config.tieBreakOrder, b.destination.id);
        return byTie !== 0 ? byTie : a.position - b.position;
      });

    const winner = ranked[0].destination;
    const runnerUp = ranked[1]?.destination;
    const winnerScore = scores[winner.id];
    const matchedSignals = matches.get(winner.id) ?? [];
    const tied = runnerUp !== undefined && scores[runnerUp.id] === winnerScore;
    const quoted = matchedSignals.map((signal) => `"${signal}"`).join(", ");
    const reason = tied
      ? `Tied at ${winnerScore} signal(s) with ${runnerUp.label}; ${winner.label} wins ties (${quoted}).`
      : `${winner.label} matched ${winnerScore} signal(s): ${quoted}.`;

    return Object.freeze({
      destination: winner.id,
      matchedSignals: Object.freeze([...matchedSignals]),
      scores: Object.freeze(scores),
      confidence: Number((winnerScore / total).toFixed(2)),
      reason
    });
  }

  return { route };
}
