import { NetworkEvent } from '../browser/NetworkEvent';
import { AggregationError } from '../errors/AppErrors';
import { ProbeResult } from '../probes/ProbeResult';
import { deepFreeze } from '../shared/ValueObject';
import { Classification, VERDICT_LABELS, Verdict, VerdictInput } from './Verdict';
import { DEFAULT_VERDICT_RULES, RuleMatch, VerdictRule, inconclusiveRule } from './VerdictRules';

/**
 * Rule-based verdict classifier.
 * Evaluates an ordered rule table; the first match is the verdict.
 */
export class VerdictClassifier {
  constructor(private readonly rules: readonly VerdictRule[] = DEFAULT_VERDICT_RULES) {}

  /**
   * Returns the first matching verdict.
   */
  classify(
    results: readonly ProbeResult[],
    events: readonly NetworkEvent[],
    consoleErrors: readonly string[]
  ): Verdict {
    return this.evaluate(results, events, consoleErrors).verdict;
  }

  /**
   * Returns the first matching verdict together with every later rule
   * that also matched (the catch-all excluded).
   */
  evaluate(
    results: readonly ProbeResult[],
    events: readonly NetworkEvent[],
    consoleErrors: readonly string[]
  ): Classification {
    this.assertConsistent(results, events);
    const input: VerdictInput = { results, events, consoleErrors };

    const matches: Verdict[] = [];
    for (const rule of this.rules) {
      const match = rule.match(input);
      if (match) {
        matches.push(this.toVerdict(rule, match));
      }
    }

    if (matches.length === 0) {
      const fallback = inconclusiveRule.match(input);
      if (!fallback) {
        throw new AggregationError('catch-all rule produced no verdict');
      }
      matches.push(this.toVerdict(inconclusiveRule, fallback));
    }

    const [verdict, ...rest] = matches;
    return deepFreeze({
      verdict,
      additionalFindings: rest.filter(v => v.code !== 'INCONCLUSIVE'),
    });
  }

  private toVerdict(rule: VerdictRule, match: RuleMatch): Verdict {
    return deepFreeze({
      code: rule.code,
      label: VERDICT_LABELS[rule.code],
      rationale: match.rationale,
      evidence: {
        probes: [...(match.probes ?? [])],
        events: [...(match.events ?? [])],
        consoleErrors: [...(match.consoleErrors ?? [])],
      },
      recommendations: [...rule.recommendations],
    });
  }

  private assertConsistent(results: readonly ProbeResult[], events: readonly NetworkEvent[]): void {
    const seen = new Set<string>();
    for (const result of results) {
      if (seen.has(result.probeId)) {
        throw new AggregationError(`duplicate result for probe '${result.probeId}'`);
      }
      seen.add(result.probeId);
    }

    for (let i = 1; i < events.length; i++) {
      if (Date.parse(events[i].startedAt) < Date.parse(events[i - 1].startedAt)) {
        throw new AggregationError(`network events out of order at index ${i}`);
      }
    }
  }
}
