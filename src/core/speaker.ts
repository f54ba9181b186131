export type SpeakerPredicate = (speaker: string) => boolean;

/** Exact alias match, ignoring case and surrounding whitespace */
export function createSpeakerPredicate(aliases: readonly string[]): SpeakerPredicate {
  const wanted = new Set(aliases.map(normalise).filter(a => a.length > 0));
  return (speaker: string) => wanted.has(normalise(speaker));
}

function normalise(name: string): string {
  return name.trim().toLowerCase();
}
