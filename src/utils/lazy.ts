/**
 * Defers a computation until first use and caches the result, including `null` and `undefined`
 */
export function lazy<T>(compute: () => T): () => T {
	let cell: { value: T } | undefined;
	return () => {
		if (!cell) {
			cell = { value: compute() };
		}
		return cell.value;
	};
}
