import fs from 'fs';
import yaml from 'js-yaml';
import Ajv, { JSONSchemaType } from 'ajv';
import { ConversationTurn } from '../config/types';

export interface IntentClassification {
  intent: string;
  /** Always within [0, 1] */
  confidence: number;
}

/**
 * Opaque classification contract; the engine only relies on the output shape.
 */
export interface IntentClassifier {
  classify(text: string, history: readonly ConversationTurn[]): IntentClassification;
}

export const OUT_OF_SCOPE = 'out_of_scope';

export interface IntentRule {
  intent: string;
  confidence: number;
  keywords: string[];
}

export interface IntentRuleSet {
  fallback: IntentClassification;
  rules: IntentRule[];
}

const ruleSetSchema: JSONSchemaType<IntentRuleSet> = {
  type: 'object',
  properties: {
    fallback: {
      type: 'object',
      properties: {
        intent: { type: 'string' },
        confidence: { type: 'number' },
      },
      required: ['intent', 'confidence'],
    },
    rules: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          intent: { type: 'string', minLength: 1 },
          confidence: { type: 'number' },
          keywords: { type: 'array', items: { type: 'string' }, minItems: 1 },
        },
        required: ['intent', 'confidence', 'keywords'],
      },
    },
  },
  required: ['fallback', 'rules'],
};

const ajv = new Ajv({ allErrors: true });
const validateRuleSet = ajv.compile(ruleSetSchema);

export function loadIntentRules(filePath: string): IntentRuleSet {
  const parsed: unknown = yaml.load(fs.readFileSync(filePath, 'utf-8'));
  if (!validateRuleSet(parsed)) {
    throw new Error(`Invalid intent rules ${filePath}: ${ajv.errorsText(validateRuleSet.errors)}`);
  }
  return parsed;
}

export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** Lowercase, punctuation to spaces, padded so phrases match on word boundaries */
function normalize(text: string): string {
  const words = text.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, ' ').trim();
  return ` ${words} `;
}

/**
 * Keyword rules, first match wins. History is not consulted.
 */
export class KeywordIntentClassifier implements IntentClassifier {
  private readonly rules: Array<{ intent: string; confidence: number; phrases: string[] }>;
  private readonly fallback: IntentClassification;

  constructor(ruleSet: IntentRuleSet) {
    this.rules = ruleSet.rules.map((r) => ({
      intent: r.intent,
      confidence: clampConfidence(r.confidence),
      phrases: r.keywords.map((k) => normalize(k)).filter((k) => k.trim().length > 0),
    }));
    this.fallback = {
      intent: ruleSet.fallback.intent,
      confidence: clampConfidence(ruleSet.fallback.confidence),
    };
  }

  static fromFile(filePath: string): KeywordIntentClassifier {
    return new KeywordIntentClassifier(loadIntentRules(filePath));
  }

  classify(text: string, _history: readonly ConversationTurn[]): IntentClassification {
    const haystack = normalize(text);
    for (const rule of this.rules) {
      if (rule.phrases.some((p) => haystack.includes(p))) {
        return { intent: rule.intent, confidence: rule.confidence };
      }
    }
    return { ...this.fallback };
  }
}
