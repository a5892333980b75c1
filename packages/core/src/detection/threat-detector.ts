/**
 * ThreatDetector — folds monitored events into a threat score.
 *
 * `observe` is pure: the next score depends only on the previous score, the
 * event and the detector's fixed signatures and settings. Each signature and
 * each behaviour kind counts at most once per session, contributions add up
 * and the aggregate is clamped to [0, 1] and rounded to nine decimal places,
 * so a score never decreases.
 */

import {
  MonitoredEventSchema,
  type AnalysisConfig,
  type BehaviorKind,
  type MonitoredEvent,
  type ThreatLevel,
  type ThreatScore,
} from '@detonate/shared';
import { BEHAVIOR_RULES } from './behaviors.js';
import { matchesSignature, type CompiledSignature } from './signatures.js';

export interface DetectorSettings {
  minorThreshold: number;
  suspiciousThreshold: number;
  maliciousThreshold: number;
  criticalThreshold: number;
  activeBehaviors: readonly BehaviorKind[];
  behaviorWeights: Readonly<Record<BehaviorKind, number>>;
}

export function detectorSettings(config: AnalysisConfig): DetectorSettings {
  return {
    minorThreshold: config.minor_threshold,
    suspiciousThreshold: config.suspicious_threshold,
    maliciousThreshold: config.malicious_threshold,
    criticalThreshold: config.critical_threshold,
    activeBehaviors: [...new Set(config.suspicious_behaviors)],
    behaviorWeights: config.behavior_weights,
  };
}

export const EMPTY_SCORE: ThreatScore = Object.freeze({
  aggregateValue: 0,
  matchedSignatures: [],
  behaviorFlags: [],
});

const clamp = (value: number) => Math.min(1, Math.max(0, value));

// Weights are decimal fractions; drop binary noise so 0.3 + 0.6 still meets 0.9.
const settle = (value: number) => Math.round(clamp(value) * 1e9) / 1e9;

export class ThreatDetector {
  private readonly signatures: readonly CompiledSignature[];
  private readonly settings: DetectorSettings;
  private readonly conclusive: ReadonlySet<string>;

  constructor(signatures: readonly CompiledSignature[], settings: DetectorSettings) {
    this.signatures = signatures;
    this.settings = settings;
    this.conclusive = new Set(
      signatures.filter((s) => s.signature.conclusive).map((s) => s.signature.id)
    );
  }

  observe(event: MonitoredEvent, score: ThreatScore = EMPTY_SCORE): ThreatScore {
    if (!MonitoredEventSchema.safeParse(event).success) return score;

    let added = 0;
    const matched = [...score.matchedSignatures];
    const flags = [...score.behaviorFlags];

    for (const compiled of this.signatures) {
      const { id, severityWeight } = compiled.signature;
      if (matched.includes(id) || !matchesSignature(compiled, event)) continue;
      matched.push(id);
      added += severityWeight;
    }

    for (const kind of this.settings.activeBehaviors) {
      if (flags.includes(kind) || !BEHAVIOR_RULES[kind](event)) continue;
      flags.push(kind);
      added += this.settings.behaviorWeights[kind];
    }

    if (matched.length === score.matchedSignatures.length && flags.length === score.behaviorFlags.length) {
      return score;
    }

    return Object.freeze({
      aggregateValue: settle(score.aggregateValue + added),
      matchedSignatures: matched,
      behaviorFlags: flags,
    });
  }

  /** Fold a whole event sequence from an empty score. */
  score(events: Iterable<MonitoredEvent>): ThreatScore {
    let score = EMPTY_SCORE;
    for (const event of events) score = this.observe(event, score);
    return score;
  }

  classify(score: ThreatScore): ThreatLevel {
    if (score.matchedSignatures.some((id) => this.conclusive.has(id))) return 'critical';

    const { aggregateValue: value } = score;
    const s = this.settings;
    if (value >= s.criticalThreshold) return 'critical';
    if (value >= s.maliciousThreshold) return 'high';
    if (value >= s.suspiciousThreshold) return 'medium';
    if (value >= s.minorThreshold && value > 0) return 'low';
    return 'none';
  }
}
