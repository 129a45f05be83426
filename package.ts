/**
 * Startup package loader.
 *
 * Every package under src/package/ that holds startup data is listed in
 * {@link PACKAGES}. They are loaded in dependency order: a package's
 * dependencies always finish before it starts.
 */

import { loadPackage, type Package } from "package-loader";
import config from "./src/package/config.js";
import content from "./src/package/content.js";
import logger from "./src/utils/logger.js";

export const PACKAGES: ReadonlyArray<Package> = [content, config];

/**
 * Build a dependency graph from packages
 */
function buildDependencyGraph(packages: ReadonlyArray<Package>): Map<string, Set<string>> {
	const graph = new Map<string, Set<string>>();
	for (const pkg of packages) graph.set(pkg.name, new Set());

	for (const pkg of packages) {
		const edges = graph.get(pkg.name);
		for (const dep of pkg.dependencies ?? []) {
			if (!graph.has(dep.name)) {
				logger.warn(`Package "${pkg.name}" depends on "${dep.name}" which is not registered`);
				continue;
			}
			edges?.add(dep.name);
		}
	}

	return graph;
}

/**
 * Topological sort of packages based on dependencies
 * Returns packages in order: dependencies first, dependents last
 */
function sortPackages(packages: ReadonlyArray<Package>): Package[] {
	const graph = buildDependencyGraph(packages);
	const packageMap = new Map(packages.map((pkg) => [pkg.name, pkg]));
	const sorted: Package[] = [];
	const visited = new Set<string>();
	const visiting = new Set<string>();

	function visit(name: string): void {
		if (visiting.has(name)) {
			const cycle = Array.from(visiting).concat([name]);
			throw new Error(`Circular dependency detected: ${cycle.join(" -> ")}`);
		}
		if (visited.has(name)) return;

		visiting.add(name);
		for (const dep of graph.get(name) ?? []) visit(dep);
		visiting.delete(name);
		visited.add(name);

		const pkg = packageMap.get(name);
		if (pkg) sorted.push(pkg);
	}

	for (const pkg of packages) visit(pkg.name);
	return sorted;
}

/**
 * Load all packages in dependency order
 */
export async function loadAllPackages(packages: ReadonlyArray<Package> = PACKAGES): Promise<void> {
	const sortedPackages = sortPackages(packages);
	logger.info(`Loading ${sortedPackages.length} package(s) in dependency order...`);

	for (const pkg of sortedPackages) {
		logger.debug(`Loading package: ${pkg.name}`);
		await loadPackage(pkg);
	}

	logger.info(`Successfully loaded ${sortedPackages.length} package(s)`);
}
