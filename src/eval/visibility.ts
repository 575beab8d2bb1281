import type { Statement, Stylesheet, TrackedNode } from '../tree/types';

/**
 * Whether a node of the resolved tree produces output.
 *
 * Walks from the node to the root: an explicit 'visible' or 'hidden' flag
 * decides immediately, a `blocksOutput` node with an inherited flag hides,
 * otherwise the parent decides. A root with nothing set is visible.
 */
export function isEffectivelyVisible(node: TrackedNode): boolean {
    let current: TrackedNode | undefined = node;
    while (current) {
        if (current.visibility === 'visible') return true;
        if (current.visibility === 'hidden') return false;
        if (current.blocksOutput) return false;
        current = current.parent;
    }
    return true;
}

/**
 * Reference-mode view of an imported sheet: every top-level statement
 * blocks output and keeps an inherited visibility flag. The source sheet is
 * not modified.
 */
export function markReference(sheet: Stylesheet): Stylesheet {
    const rules: Statement[] = sheet.rules.map((rule) => ({ ...rule, blocksOutput: true }));
    return { ...sheet, rules };
}

/** Force output of a node even under a blocking ancestor */
export function ensureVisible(node: Statement): void {
    if (node.visibility === 'inherit') node.visibility = 'visible';
}
