// ============================================================================
// Shardline Runner - Descriptions
// The class → method trees that providers build and the runner filters,
// sorts, shards and reports on.
// ============================================================================

export interface Description {
	readonly kind: 'suite' | 'test';
	/** `Class` for class nodes, `Class#method` for test leaves */
	readonly displayName: string;
	/** Owning class (absent on the run root and composite roots) */
	readonly className?: string;
	readonly methodName?: string;
	readonly children: readonly Description[];
}

export interface DescriptionFilter {
	shouldRun(description: Description): boolean;
	describe(): string;
}

export type DescriptionComparator = (a: Description, b: Description) => number;

export function createSuiteDescription(
	displayName: string,
	children: readonly Description[],
	className?: string,
): Description {
	return { kind: 'suite', displayName, className, children };
}

export function createTestDescription(className: string, methodName: string): Description {
	return {
		kind: 'test',
		displayName: `${className}#${methodName}`,
		className,
		methodName,
		children: [],
	};
}

/** All test leaves, depth first */
export function leavesOf(description: Description): Description[] {
	if (description.kind === 'test') return [description];
	return description.children.flatMap(leavesOf);
}

export function countTests(description: Description): number {
	return leavesOf(description).length;
}

/**
 * Apply a filter to a tree. Suites that end up empty are pruned, except the
 * root, which is kept with no children.
 */
export function filterDescription(root: Description, filter: DescriptionFilter): Description {
	if (root.kind === 'test') {
		return filter.shouldRun(root) ? root : { ...root, kind: 'suite', children: [] };
	}
	return { ...root, children: filterChildren(root.children, filter) };
}

function filterChildren(
	children: readonly Description[],
	filter: DescriptionFilter,
): Description[] {
	const kept: Description[] = [];
	for (const child of children) {
		if (!filter.shouldRun(child)) continue;
		if (child.kind === 'test') {
			kept.push(child);
			continue;
		}
		const grandChildren = filterChildren(child.children, filter);
		if (grandChildren.length > 0) {
			kept.push({ ...child, children: grandChildren });
		}
	}
	return kept;
}

/** Sort children at every level. The sort is stable. */
export function sortDescription(root: Description, comparator: DescriptionComparator): Description {
	if (root.kind === 'test') return root;
	return {
		...root,
		children: root.children.map((child) => sortDescription(child, comparator)).sort(comparator),
	};
}

/** Orders by display name, comparing UTF-16 code units */
export const alphabetical: DescriptionComparator = (a, b) => {
	if (a.displayName < b.displayName) return -1;
	if (a.displayName > b.displayName) return 1;
	return 0;
};
