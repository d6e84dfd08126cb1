import { LRUCache } from '../../utils/LRUCache';

describe('LRUCache', () => {
	let cache: LRUCache<string, string>;

	beforeEach(() => {
		cache = new LRUCache<string, string>(3);
	});

	describe('basic operations', () => {
		test('should store and retrieve values', () => {
			cache.set('key1', 'value1');
			cache.set('key2', 'value2');

			expect(cache.get('key1')).toBe('value1');
			expect(cache.get('key2')).toBe('value2');
		});

		test('should return undefined for non-existent keys', () => {
			expect(cache.get('nonexistent')).toBeUndefined();
			expect(cache.has('nonexistent')).toBe(false);
		});

		test('should update existing values', () => {
			cache.set('key1', 'value1');
			cache.set('key1', 'updated');

			expect(cache.get('key1')).toBe('updated');
			expect(cache.size()).toBe(1);
		});

		test('should treat a stored undefined as a hit', () => {
			const optional = new LRUCache<string, string | undefined>(2);
			optional.set('empty', undefined);

			expect(optional.has('empty')).toBe(true);
			expect(optional.size()).toBe(1);
		});

		test('should reject a size that is not a positive integer', () => {
			expect(() => new LRUCache<string, string>(0)).toThrow(RangeError);
			expect(() => new LRUCache<string, string>(1.5)).toThrow(RangeError);
		});
	});

	describe('LRU eviction', () => {
		test('should evict least recently used item when capacity is exceeded', () => {
			cache.set('key1', 'value1');
			cache.set('key2', 'value2');
			cache.set('key3', 'value3');
			cache.set('key4', 'value4'); // This should evict key1

			expect(cache.get('key1')).toBeUndefined();
			expect(cache.get('key2')).toBe('value2');
			expect(cache.get('key3')).toBe('value3');
			expect(cache.get('key4')).toBe('value4');
		});

		test('should update access order on get', () => {
			cache.set('key1', 'value1');
			cache.set('key2', 'value2');
			cache.set('key3', 'value3');

			// Access key1 to make it most recently used
			cache.get('key1');

			// Add key4, should evict key2 (least recently used)
			cache.set('key4', 'value4');

			expect(cache.get('key1')).toBe('value1');
			expect(cache.get('key2')).toBeUndefined();
		});

		test('should report evicted entries', () => {
			const onEvict = jest.fn();
			const small = new LRUCache<string, number>(1, onEvict);
			small.set('a', 1);
			small.set('b', 2);

			expect(onEvict).toHaveBeenCalledTimes(1);
			expect(onEvict).toHaveBeenCalledWith('a', 1);
		});

		test('should not report a value that is only replaced', () => {
			const onEvict = jest.fn();
			const small = new LRUCache<string, number>(1, onEvict);
			small.set('a', 1);
			small.set('a', 2);

			expect(onEvict).not.toHaveBeenCalled();
			expect(small.get('a')).toBe(2);
		});
	});

	describe('clear', () => {
		test('should drop every entry and report each one', () => {
			const onEvict = jest.fn();
			const withHook = new LRUCache<string, number>(3, onEvict);
			withHook.set('a', 1);
			withHook.set('b', 2);

			withHook.clear();

			expect(withHook.size()).toBe(0);
			expect(onEvict).toHaveBeenCalledTimes(2);
			expect(onEvict).toHaveBeenNthCalledWith(1, 'a', 1);
			expect(onEvict).toHaveBeenNthCalledWith(2, 'b', 2);
		});
	});
});
