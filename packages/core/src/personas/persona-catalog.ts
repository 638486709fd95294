export const DEFAULT_PERSONA = "Wanderer";
export const FALLBACK_PERSONA = "Eclectic Traveler";

/** Catalog order decides ties between personas with the same keyword count. */
export const PERSONA_CATALOG = [
  {
    persona: "The Adventure Seeker",
    keywords: ["Hike", "Mountain", "Safari", "Canyon", "River"],
  },
  {
    persona: "The Cultured Explorer",
    keywords: ["Museum", "Art", "Gallery", "Historic", "Palace", "Temple", "Castle", "Church", "Mosque"],
  },
  {
    persona: "The Urban Wanderer",
    keywords: ["Market", "Shopping", "Food", "Tour"],
  },
  {
    persona: "The Nature Lover",
    keywords: ["Park", "Beach", "Island", "Lake", "Zoo", "Aquarium"],
  },
] as const;

export type CatalogPersona = (typeof PERSONA_CATALOG)[number]["persona"];

export type Persona = CatalogPersona | typeof DEFAULT_PERSONA | typeof FALLBACK_PERSONA;

export const TRAVEL_KEYWORDS: readonly string[] = PERSONA_CATALOG.flatMap((entry) => entry.keywords);
