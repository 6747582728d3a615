import { MERGEABLE_FIELDS } from '../types/library.js';
import type { ConflictPolicy, MergeableField, MergeResult, Track, TrackTags } from '../types/library.js';

function isEmpty(value: string | number | null): boolean {
  return value === null || (typeof value === 'string' && value.trim() === '');
}

/** True when `incoming` is strictly more recent than `existing`. Unknown timestamps never win. */
export function isNewer(incoming: string | null, existing: string | null): boolean {
  if (!incoming) return false;
  if (!existing) return true;
  return new Date(incoming).getTime() > new Date(existing).getTime();
}

export function copyTagField<K extends MergeableField>(
  target: Partial<Pick<Track, MergeableField>>,
  source: TrackTags,
  key: K,
): void {
  target[key] = source[key];
}

/**
 * Field-by-field merge of tag data.
 *
 * `keep_newest` and `keep_both` fill fields that are empty on the existing
 * side. `keep_newest` also overwrites differing values when the incoming
 * record is more recent; `keep_both` leaves them alone and reports them as
 * conflicting. `user_prompt` changes nothing and reports every differing
 * field for the user to decide.
 */
export function mergeMetadata(
  existing: TrackTags,
  incoming: TrackTags,
  policy: ConflictPolicy,
): MergeResult {
  const merged: TrackTags = { ...existing };
  const changedFields: MergeableField[] = [];
  const conflictingFields: MergeableField[] = [];
  const incomingIsNewer = isNewer(incoming.providerModifiedAt, existing.providerModifiedAt);

  for (const field of MERGEABLE_FIELDS) {
    const current = existing[field];
    const next = incoming[field];

    if (isEmpty(next) || current === next) continue;

    if (policy === 'user_prompt') {
      conflictingFields.push(field);
      continue;
    }

    if (isEmpty(current)) {
      copyTagField(merged, incoming, field);
      changedFields.push(field);
      continue;
    }

    if (policy === 'keep_newest') {
      if (incomingIsNewer) {
        copyTagField(merged, incoming, field);
        changedFields.push(field);
      }
      continue;
    }

    conflictingFields.push(field);
  }

  if (incomingIsNewer && policy !== 'user_prompt') {
    merged.providerModifiedAt = incoming.providerModifiedAt;
  }

  return { merged, changedFields, conflictingFields };
}
