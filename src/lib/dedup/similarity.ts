import { type BaseOptions, type Change, diffChars } from "diff";

export const DUPLICATE_THRESHOLD = 0.8;

type CharDiffOptions = BaseOptions & { maxEditLength?: number };

// Upper bound on matched characters: no alignment matches more of a character than both sides hold.
function sharedCharacterBound(left: string, right: string): number {
	const counts = new Map<string, number>();
	for (let index = 0; index < left.length; index++) {
		const unit = left.charAt(index);
		counts.set(unit, (counts.get(unit) ?? 0) + 1);
	}
	let shared = 0;
	for (let index = 0; index < right.length; index++) {
		const unit = right.charAt(index);
		const remaining = counts.get(unit) ?? 0;
		if (remaining > 0) {
			counts.set(unit, remaining - 1);
			shared++;
		}
	}
	return shared;
}

/**
 * Character-level similarity in [0, 1]: twice the matched characters of an
 * LCS alignment over the combined length. Two empty strings are identical.
 *
 * Returns null once the pair is known not to be a duplicate, either from the
 * character counts or because the diff passed the edit length a duplicate allows.
 */
export function similarityRatio(left: string, right: string): number | null {
	const total = left.length + right.length;
	if (total === 0) {
		return 1;
	}
	if (left === right) {
		return 1;
	}
	if (!isDuplicate((2 * sharedCharacterBound(left, right)) / total)) {
		return null;
	}
	// ratio = (total - edits) / total, so a duplicate needs edits < (1 - threshold) * total.
	const maxEditLength = Math.ceil((1 - DUPLICATE_THRESHOLD) * total);
	const options: CharDiffOptions = { maxEditLength };
	const changes: Change[] | undefined = diffChars(left, right, options);
	if (!changes) {
		return null;
	}
	let matched = 0;
	for (const change of changes) {
		if (!change.added && !change.removed) {
			matched += change.value.length;
		}
	}
	return (2 * matched) / total;
}

export function isDuplicate(ratio: number | null): boolean {
	return ratio !== null && ratio > DUPLICATE_THRESHOLD;
}

export function formatRatio(ratio: number | null): string {
	if (ratio === null) {
		return `under ${formatRatio(DUPLICATE_THRESHOLD)}`;
	}
	return `${Math.round(ratio * 100)}%`;
}
