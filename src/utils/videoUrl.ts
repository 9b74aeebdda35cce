const MARKERS = ['v=', 'youtu.be/'] as const;

/**
 * Pulls the video id out of a long (`watch?v=ID`) or short (`youtu.be/ID`) link.
 * Returns null when neither marker is present or nothing follows it.
 */
export function parseVideoId(url: string): string | null {
  const trimmed = url.trim();
  for (const marker of MARKERS) {
    const index = trimmed.indexOf(marker);
    if (index === -1) {
      continue;
    }

    const rest = trimmed.slice(index + marker.length);
    const id = rest.split(/[&?]/)[0] ?? '';
    return id.length > 0 ? id : null;
  }

  return null;
}
