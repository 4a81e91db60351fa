/**
 * Package loader that discovers and loads every package in src/package/
 * in dependency order.
 *
 * This module:
 * 1. Imports every module in src/package/ (dist/src/package/ at runtime)
 * 2. Keeps the ones whose default export is a Package
 * 3. Loads them in topological order (dependencies first)
 */

import { readdir } from "fs/promises";
import { join } from "path";
import { fileURLToPath, pathToFileURL } from "url";
import { isPackage, type Package } from "./src/core/package.js";
import logger from "./src/utils/logger.js";

const PACKAGE_DIRECTORY = fileURLToPath(new URL("./src/package/", import.meta.url));

/**
 * Check if a file is a package file (not a test file)
 */
function isPackageFile(filename: string): boolean {
	return (
		(filename.endsWith(".ts") || filename.endsWith(".js")) &&
		!filename.endsWith(".d.ts") &&
		!filename.endsWith(".spec.ts") &&
		!filename.endsWith(".spec.js")
	);
}

/**
 * Import every package module in a directory.
 */
export async function discoverPackages(
	directory: string = PACKAGE_DIRECTORY
): Promise<Package[]> {
	const filenames = (await readdir(directory)).filter(isPackageFile).sort();
	const packages: Package[] = [];
	for (const filename of filenames) {
		const module: unknown = await import(
			pathToFileURL(join(directory, filename)).href
		);
		const pkg: unknown =
			typeof module === "object" && module !== null
				? Reflect.get(module, "default")
				: undefined;
		if (isPackage(pkg)) packages.push(pkg);
		else logger.debug(`${filename} has no package export`);
	}
	return packages;
}

/**
 * Topological sort of packages based on dependencies.
 * Returns packages in order: dependencies first, dependents last.
 *
 * @throws Error on a circular dependency
 */
export function sortPackages(packages: readonly Package[]): Package[] {
	const byName = new Map(packages.map((pkg) => [pkg.name, pkg]));
	const sorted: Package[] = [];
	const visited = new Set<string>();
	const visiting: string[] = [];

	function visit(pkg: Package): void {
		if (visited.has(pkg.name)) return;
		if (visiting.includes(pkg.name)) {
			const cycle = [...visiting, pkg.name];
			throw new Error(`Circular dependency detected: ${cycle.join(" -> ")}`);
		}
		visiting.push(pkg.name);
		for (const dependencyName of pkg.dependencies ?? []) {
			const dependency = byName.get(dependencyName);
			if (!dependency) {
				logger.warn(
					`Package "${pkg.name}" depends on "${dependencyName}" which was not found in package directory`
				);
				continue;
			}
			visit(dependency);
		}
		visiting.pop();
		visited.add(pkg.name);
		sorted.push(pkg);
	}

	for (const pkg of packages) visit(pkg);
	return sorted;
}

/**
 * Load all packages from the package directory in dependency order.
 */
export async function loadAllPackages(
	directory: string = PACKAGE_DIRECTORY
): Promise<void> {
	const sortedPackages = sortPackages(await discoverPackages(directory));

	logger.info(
		`Loading ${sortedPackages.length} package(s) in dependency order...`
	);

	for (const pkg of sortedPackages) {
		await logger.block(pkg.name, async () => {
			logger.debug(`Loading package: ${pkg.name}`);
			await pkg.loader();
		});
	}

	logger.info(`Successfully loaded ${sortedPackages.length} package(s)`);
}
