import { ConfidenceTier } from '@pathimpact/shared';

export interface ConfidenceInput {
  assayCount: number;
  medianPotency: number;
  priorConfidence: number;
  potencyThreshold: number;
}

interface Clause {
  holds: (input: ConfidenceInput) => boolean;
  label: (input: ConfidenceInput) => string;
  failLabel: (input: ConfidenceInput) => string;
}

export interface ConfidenceRule {
  name: string;
  tier: ConfidenceTier;
  clauses: readonly Clause[];
}

export interface ConfidenceOutcome {
  tier: ConfidenceTier;
  reasons: string[];
}

function formatThreshold(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

const replicated: Clause = {
  holds: ({ assayCount }) => assayCount >= 2,
  label: () => 'assay_count>=2',
  failLabel: () => 'assay_count<2',
};

const potentAtSix: Clause = {
  holds: ({ medianPotency }) => medianPotency >= 6.0,
  label: () => 'median_potency>=6.0',
  failLabel: () => 'median_potency<6.0',
};

const potentAtThreshold: Clause = {
  holds: ({ medianPotency, potencyThreshold }) => medianPotency >= potencyThreshold,
  label: ({ potencyThreshold }) => `median_potency>=${formatThreshold(potencyThreshold)}`,
  failLabel: ({ potencyThreshold }) => `median_potency<${formatThreshold(potencyThreshold)}`,
};

const trustedTarget: Clause = {
  holds: ({ priorConfidence }) => priorConfidence >= 9,
  label: () => 'target_confidence>=9',
  failLabel: () => 'target_confidence<9',
};

export const highConfidenceRule: ConfidenceRule = {
  name: 'rule:high',
  tier: ConfidenceTier.HIGH,
  clauses: [replicated, potentAtSix, trustedTarget],
};

export const mediumConfidenceRule: ConfidenceRule = {
  name: 'rule:medium',
  tier: ConfidenceTier.MEDIUM,
  clauses: [replicated, potentAtThreshold],
};

// Evaluated in order; the first rule whose clauses all hold wins
export const CONFIDENCE_RULES: readonly ConfidenceRule[] = [highConfidenceRule, mediumConfidenceRule];

export function ruleMatches(rule: ConfidenceRule, input: ConfidenceInput): boolean {
  return rule.clauses.every((clause) => clause.holds(input));
}

export function evaluateConfidence(
  input: ConfidenceInput,
  rules: readonly ConfidenceRule[] = CONFIDENCE_RULES
): ConfidenceOutcome {
  for (const rule of rules) {
    if (ruleMatches(rule, input)) {
      return {
        tier: rule.tier,
        reasons: [rule.name, ...rule.clauses.map((clause) => clause.label(input))],
      };
    }
  }

  // Explain the fallback through the weakest rule that could have applied
  const weakest = rules[rules.length - 1];
  const failed = weakest
    ? weakest.clauses.filter((clause) => !clause.holds(input)).map((clause) => clause.failLabel(input))
    : [];
  return { tier: ConfidenceTier.LOW, reasons: ['rule:low', ...failed] };
}
