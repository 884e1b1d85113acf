/**
 * Named inference safety profiles. The prompt builder adds the instruction to the
 * system prompt; the model router applies the sampling temperature.
 */
export interface SafetyProfile {
  instruction: string;
  temperature: number;
}

const PROFILES: ReadonlyMap<string, SafetyProfile> = new Map(Object.entries({
  standard: {
    instruction:
      'Never ask for or repeat passwords, one-time codes, PINs or full card numbers. ' +
      'If a request needs account access, say a team member will follow up.',
    temperature: 0.2,
  },
  strict: {
    instruction:
      'Never ask for or repeat passwords, one-time codes, PINs or full card numbers. ' +
      'Answer only from the provided reference passages; if they do not cover the question, ' +
      'say you will pass it to the team. Do not give legal, medical or financial advice.',
    temperature: 0,
  },
}));

export function getSafetyProfile(name: string | undefined): SafetyProfile | undefined {
  if (!name) return undefined;
  return PROFILES.get(name);
}
