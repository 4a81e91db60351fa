/**
 * A unit of startup work. Files under `src/package/` whose default export
 * has this shape are discovered and run by the root package loader, with
 * `dependencies` loaded first.
 *
 * @module core/package
 */
export interface Package {
	name: string;
	dependencies?: readonly string[];
	loader: () => Promise<void>;
}

export function isPackage(value: unknown): value is Package {
	if (typeof value !== "object" || value === null) return false;
	const name: unknown = Reflect.get(value, "name");
	const loader: unknown = Reflect.get(value, "loader");
	const dependencies: unknown = Reflect.get(value, "dependencies");
	return (
		typeof name === "string" &&
		name.length > 0 &&
		typeof loader === "function" &&
		(dependencies === undefined ||
			(Array.isArray(dependencies) &&
				dependencies.every((dependency) => typeof dependency === "string")))
	);
}
