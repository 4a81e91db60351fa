/**
 * Recursively readonly view of a value. Arrays become readonly arrays of
 * readonly elements.
 */
export type DeepReadonly<T> = T extends ReadonlyArray<infer U>
	? ReadonlyArray<DeepReadonly<U>>
	: T extends object
	? { readonly [P in keyof T]: DeepReadonly<T[P]> }
	: T;
