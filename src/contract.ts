import type {
  ComplianceResult,
  ComplianceSample,
  RuleName,
  RuleSet,
  Severity,
  Violation,
  ViolationRecord,
} from "./types.js";

export const SEVERITY_RANK: Record<Severity, number> = {
  medium: 1,
  high: 2,
  critical: 3,
};

const RULE_NAMES: RuleName[] = ["max_speed", "min_distance", "required_brake_tests"];

export function isRuleName(value: string): value is RuleName {
  return RULE_NAMES.some(rule => rule === value);
}

interface RuleCheck {
  rule: RuleName;
  severity: Severity;
  /** Returns the violation message, or null when the sample passes or the rule does not apply. */
  check(sample: Record<string, unknown>, threshold: number): string | null;
}

const isNumber = (value: unknown): value is number => typeof value === "number" && !Number.isNaN(value);

const RULES: RuleCheck[] = [
  {
    rule: "max_speed",
    severity: "high",
    check(sample, max) {
      const speed = sample.speed;
      if (!isNumber(speed) || speed <= max) return null;
      return `Speed ${speed} km/h exceeds limit ${max} km/h`;
    },
  },
  {
    rule: "min_distance",
    severity: "critical",
    check(sample, min) {
      const distance = sample.distance_to_aircraft;
      if (!isNumber(distance) || distance >= min) return null;
      return `Distance ${distance} m is below safe distance ${min} m`;
    },
  },
  {
    rule: "required_brake_tests",
    severity: "medium",
    check(sample, required) {
      const count = sample.brake_test_count;
      if (!Number.isInteger(count) || !isNumber(count) || count >= required) return null;
      return `Brake test performed ${count} times, fewer than required ${required}`;
    },
  },
];

/**
 * Named rule set evaluated against one sample at a time. Keeps an append-only history
 * of every violation it has produced.
 */
export class Contract {
  private ruleSet: RuleSet;
  private history: ViolationRecord[] = [];

  constructor(readonly name: string, rules: RuleSet, private clock: () => Date = () => new Date()) {
    this.ruleSet = { ...rules };
  }

  get rules(): Readonly<RuleSet> {
    return this.ruleSet;
  }

  get violations(): readonly ViolationRecord[] {
    return this.history;
  }

  /** Effective rules for one evaluation; the contract itself is not modified. */
  withOverrides(overrides: RuleSet): RuleSet {
    const effective: RuleSet = { ...this.ruleSet };
    for (const rule of RULE_NAMES) {
      const value = overrides[rule];
      if (value !== undefined) effective[rule] = value;
    }
    return effective;
  }

  /** Administrative threshold update. */
  updateRules(patch: RuleSet): Readonly<RuleSet> {
    this.ruleSet = this.withOverrides(patch);
    return this.ruleSet;
  }

  checkCompliance(sample: ComplianceSample | Record<string, unknown>): ComplianceResult {
    return this.evaluate(sample, this.ruleSet);
  }

  /**
   * Evaluates every rule independently against `rules`. Fields that are missing or of
   * the wrong type skip their rule; so does a rule without a threshold.
   */
  evaluate(sample: ComplianceSample | Record<string, unknown>, rules: RuleSet): ComplianceResult {
    const fields: Record<string, unknown> = { ...sample };
    const violations: Violation[] = [];

    for (const { rule, severity, check } of RULES) {
      const threshold = rules[rule];
      if (threshold === undefined) continue;

      const message = check(fields, threshold);
      if (message !== null) {
        violations.push({ rule, violation: message, severity, timestamp: this.clock().toISOString() });
      }
    }

    const checkedAt = this.clock().toISOString();
    for (const violation of violations) {
      this.history.push({ contract: this.name, violation, original_data: fields, recorded_at: checkedAt });
    }

    return { compliant: violations.length === 0, violations, checked_at: checkedAt };
  }
}
