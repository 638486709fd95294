import {
  DEFAULT_PERSONA,
  FALLBACK_PERSONA,
  PERSONA_CATALOG,
  type Persona,
} from "./persona-catalog";

export function calculatePersona(interests: readonly string[]): Persona {
  if (interests.length === 0) {
    return DEFAULT_PERSONA;
  }

  let best: Persona = FALLBACK_PERSONA;
  let bestCount = 0;
  for (const entry of PERSONA_CATALOG) {
    const keywords: readonly string[] = entry.keywords;
    const count = interests.filter((interest) => keywords.includes(interest)).length;
    if (count > bestCount) {
      best = entry.persona;
      bestCount = count;
    }
  }
  return best;
}
