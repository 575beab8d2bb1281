import type { Declaration, Statement, Stylesheet } from '../tree/types';
import { assertNever } from '../tree/types';
import { selectorToString } from '../tree/selector';
import { isEffectivelyVisible } from '../eval/visibility';
import { valueToCSS } from './value-css';

const INDENT = '  ';

/**
 * Print an evaluated stylesheet. Only effectively visible output appears:
 * empty blocks and at-rules with nothing visible inside are skipped. A rule
 * block prints the selectors that are visible on their own terms; those
 * added by an extend follow the block that declared the extend.
 *
 *   .a, .b {
 *     color: black;
 *   }
 */
export function toCSS(sheet: Stylesheet): string {
    const lines: string[] = [];
    printRules(sheet.rules, 0, lines);
    return lines.join('\n');
}

function printDeclaration(decl: Declaration): string {
    return `${decl.name}: ${valueToCSS(decl.value)}${decl.important ? ' !important' : ''};`;
}

function printRules(rules: Statement[], depth: number, lines: string[]): void {
    const pad = INDENT.repeat(depth);
    for (const node of rules) {
        switch (node.type) {
            case 'Declaration':
                if (isEffectivelyVisible(node)) lines.push(pad + printDeclaration(node));
                break;
            case 'RuleBlock': {
                const blockVisible = isEffectivelyVisible(node);
                const selectors = node.selectors.filter((sel) => (sel.extended ? sel.extended.visible : blockVisible));
                // A visible extend of a hidden block brings its declarations along
                const extendedOnly = !blockVisible && selectors.length > 0;
                const body: string[] = [];
                const nested: Statement[] = [];
                for (const child of node.rules) {
                    if (child.type === 'RuleBlock' || child.type === 'ConditionalAtRule' || (child.type === 'AtRule' && child.rules)) nested.push(child);
                    else if (child.type === 'Declaration' && extendedOnly) {
                        if (child.visibility !== 'hidden') body.push(INDENT.repeat(depth + 1) + printDeclaration(child));
                    } else printRules([child], depth + 1, body);
                }
                if (body.length > 0 && selectors.length > 0) {
                    lines.push(`${pad}${selectors.map(selectorToString).join(', ')} {`, ...body, `${pad}}`);
                }
                printRules(nested, depth, lines);
                break;
            }
            case 'ConditionalAtRule': {
                const body: string[] = [];
                printRules(node.rules, depth + 1, body);
                if (body.length > 0) lines.push(`${pad}@${node.kind} ${valueToCSS(node.features)} {`, ...body, `${pad}}`);
                break;
            }
            case 'AtRule': {
                const head = node.prelude ? `@${node.name} ${valueToCSS(node.prelude)}` : `@${node.name}`;
                if (!node.rules) {
                    if (isEffectivelyVisible(node)) lines.push(`${pad}${head};`);
                    break;
                }
                const body: string[] = [];
                printRules(node.rules, depth + 1, body);
                if (body.length > 0) lines.push(`${pad}${head} {`, ...body, `${pad}}`);
                break;
            }
            case 'Import':
                if (isEffectivelyVisible(node)) lines.push(`${pad}@import ${valueToCSS(node.path)};`);
                break;
            case 'MixinDefinition':
            case 'MixinInvocation':
            case 'ExtendClause':
            case 'DetachedCall':
                break;
            default:
                assertNever(node);
        }
    }
}
