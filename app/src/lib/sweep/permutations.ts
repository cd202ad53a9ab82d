/**
 * Batting order permutations
 */

/**
 * n! as a number (exact up to 18!)
 */
export function countPermutations(n: number): number {
	let total = 1;
	for (let i = 2; i <= n; i++) {
		total *= i;
	}
	return total;
}

/**
 * Lazily yield every ordering of `ids`, in lexicographic order of their
 * positions in the input (the input order itself comes first).
 */
export function* lineupPermutations<T>(ids: readonly T[]): Generator<T[], void, undefined> {
	const indexes = ids.map((_, i) => i);

	while (true) {
		yield indexes.map((i) => ids[i]);

		// Next permutation: rightmost ascent, swap with the smallest larger element to its right, reverse the tail
		let pivot = indexes.length - 2;
		while (pivot >= 0 && indexes[pivot] >= indexes[pivot + 1]) {
			pivot--;
		}
		if (pivot < 0) {
			return;
		}

		let successor = indexes.length - 1;
		while (indexes[successor] <= indexes[pivot]) {
			successor--;
		}
		[indexes[pivot], indexes[successor]] = [indexes[successor], indexes[pivot]];

		for (let left = pivot + 1, right = indexes.length - 1; left < right; left++, right--) {
			[indexes[left], indexes[right]] = [indexes[right], indexes[left]];
		}
	}
}
