/**
 * Audio Source
 *
 * Where a message's narration comes from, resolved once to a locator
 * string (or null for silence).
 */

import { SpotlightError } from "@tourlight/core";

export type AudioSource =
  | { kind: "uri"; uri: string }
  | { kind: "resource"; id: number | string }
  | { kind: "file"; path: string }
  | { kind: "none" };

/** Maps a bundled resource id to a playable URI */
export type ResourceResolver = (id: number | string) => string;

const FILE_SCHEME = "file://";

export const AudioSource = {
  uri: (uri: string): AudioSource => ({ kind: "uri", uri }),
  resource: (id: number | string): AudioSource => ({ kind: "resource", id }),
  file: (path: string): AudioSource => ({ kind: "file", path }),
  none: { kind: "none" } as const satisfies AudioSource,
};

export function resolveAudioSource(source: AudioSource, resolveResource?: ResourceResolver): string | null {
  switch (source.kind) {
    case "uri":
      return source.uri;
    case "file":
      return source.path.startsWith(FILE_SCHEME) ? source.path : `${FILE_SCHEME}${source.path}`;
    case "resource":
      if (!resolveResource) {
        throw new SpotlightError("INVALID_MESSAGE", "A resource audio source needs a resource resolver", {
          context: { id: source.id },
        });
      }
      return resolveResource(source.id);
    case "none":
      return null;
  }
}
