export function memoize<A extends unknown[], R>(fn: (...args: A) => R): (...args: A) => R {
	const cache = new Map<string, R>();
	return (...args: A): R => {
		const key = JSON.stringify(args);
		if (cache.has(key)) {
			const cached = cache.get(key);
			if (cached !== undefined) {
				return cached;
			}
		}
		const result = fn(...args);
		cache.set(key, result);
		return result;
	};
}
