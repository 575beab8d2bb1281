import type { ScopeRef } from '../eval/scope';

/** Where a node came from, for diagnostics */
export interface SourcePosition {
    file?: string;
    /** 1-based */
    line: number;
    /** 1-based */
    column: number;
}

/**
 * Output visibility of a node.
 *
 *   inherit  decided by `blocksOutput` on the node and its ancestors
 *   visible  always emitted, even under a blocking ancestor
 *   hidden   never emitted
 */
export type Visibility = 'inherit' | 'visible' | 'hidden';

/** Fields shared by every statement-level node */
interface NodeBase {
    pos: SourcePosition;
    visibility: Visibility;
    /** Set on nodes introduced by a reference-mode import */
    blocksOutput: boolean;
    /** Non-owning back-reference to the enclosing container (set on evaluated output) */
    parent?: Container;
}

// =============================================================================
// Selectors
// =============================================================================

/** '' joins into a compound selector, ' ' is the descendant combinator */
export type Combinator = '' | ' ' | '>' | '+' | '~';

/** One simple-selector fragment: `.a`, `#b`, `div`, `:hover`, `[x=y]`, `&` */
export interface Element {
    type: 'Element';
    combinator: Combinator;
    value: string;
}

export type ExtendMode = 'exact' | 'all';

export interface Selector {
    type: 'Selector';
    elements: Element[];
    /** `:extend(...)` clauses written on this selector */
    extends: ExtendClause[];
    pos: SourcePosition;
    /** Present on selectors added by an extend */
    extended?: ExtendedFrom;
}

/**
 * Where an extend-added selector came from. It prints with the visibility of
 * the block that declared the extend, not the block it was added to.
 */
export interface ExtendedFrom {
    visible: boolean;
    /** Keys of every extend the selector was derived through */
    via: string[];
}

/**
 * `:extend(target)` on a selector, or `&:extend(target);` inside a rule body.
 * The statement form applies to every selector of the enclosing rule block.
 */
export interface ExtendClause extends NodeBase {
    type: 'ExtendClause';
    target: Selector;
    mode: ExtendMode;
}

// =============================================================================
// Values
// =============================================================================

export interface Dimension {
    type: 'Dimension';
    value: number;
    unit: string;
}

export interface Color {
    type: 'Color';
    rgb: [number, number, number];
    alpha: number;
    /** Source spelling, kept for output until the color is computed on */
    raw?: string;
}

export interface Keyword {
    type: 'Keyword';
    value: string;
}

export interface Quoted {
    type: 'Quoted';
    value: string;
    quote: '"' | "'";
    /** `~"..."`, printed without quotes */
    escaped: boolean;
}

/** Space-separated values */
export interface Expression {
    type: 'Expression';
    items: Value[];
}

/** Comma-separated values */
export interface ValueList {
    type: 'ValueList';
    items: Value[];
}

export interface VariableRef {
    type: 'VariableRef';
    /** Includes the leading `@` */
    name: string;
    pos?: SourcePosition;
}

export type ArithmeticOperator = '+' | '-' | '*' | '/';

export interface Operation {
    type: 'Operation';
    op: ArithmeticOperator;
    left: Value;
    right: Value;
    pos?: SourcePosition;
}

/** Function call: built-in, user-registered or passed through as a literal */
export interface Call {
    type: 'Call';
    name: string;
    args: Value[];
    pos?: SourcePosition;
}

/** Parenthesised media/container feature: `(min-width: 200px)` or `(color)` */
export interface MediaFeature {
    type: 'MediaFeature';
    name: string;
    value?: Value;
}

/** A rule body held as a value; `closure` is captured when the value is evaluated */
export interface DetachedBlock {
    type: 'DetachedBlock';
    rules: Statement[];
    closure?: ScopeRef;
}

export type Value = Dimension | Color | Keyword | Quoted | Expression | ValueList | VariableRef | Operation | Call | MediaFeature | DetachedBlock;

// =============================================================================
// Guard conditions
// =============================================================================

export type ComparisonOperator = '<' | '<=' | '=<' | '=' | '>=' | '>';

export interface Comparison {
    type: 'Comparison';
    op: ComparisonOperator;
    left: Value;
    right: Value;
}

export interface AndCondition {
    type: 'And';
    left: Condition;
    right: Condition;
}

export interface OrCondition {
    type: 'Or';
    left: Condition;
    right: Condition;
}

export interface NotCondition {
    type: 'Not';
    condition: Condition;
}

/** `when (@flag)` is true only when the value evaluates to the keyword `true` */
export interface Truthy {
    type: 'Truthy';
    value: Value;
}

export type Condition = Comparison | AndCondition | OrCondition | NotCondition | Truthy;

// =============================================================================
// Statements
// =============================================================================

/** Property declaration, or variable binding when `variable` is set */
export interface Declaration extends NodeBase {
    type: 'Declaration';
    name: string;
    value: Value;
    important: boolean;
    variable: boolean;
}

export interface RuleBlock extends NodeBase {
    type: 'RuleBlock';
    selectors: Selector[];
    rules: Statement[];
    /** CSS guard; the block is dropped when it evaluates false */
    guard?: Condition;
    /** Statement-form extends, collected during evaluation */
    extends: ExtendClause[];
}

export interface MixinParam {
    /** Variable name including `@`; absent for pattern and anonymous rest params */
    name?: string;
    defaultValue?: Value;
    /** Literal value the argument must equal (compared as CSS text) */
    pattern?: Value;
    variadic: boolean;
}

export interface MixinDefinition extends NodeBase {
    type: 'MixinDefinition';
    /** `.name` or `#name` */
    name: string;
    params: MixinParam[];
    guard?: Condition;
    rules: Statement[];
}

export interface MixinArgument {
    /** Named argument, including `@` */
    name?: string;
    value: Value;
}

export interface MixinInvocation extends NodeBase {
    type: 'MixinInvocation';
    /** Namespace path, e.g. ['#ns', '.m'] */
    path: string[];
    args: MixinArgument[];
    important: boolean;
}

export type ConditionalAtRuleKind = 'media' | 'supports' | 'container';

/** `@media`, `@supports`, `@container`: nest, bubble and permute */
export interface ConditionalAtRule extends NodeBase {
    type: 'ConditionalAtRule';
    kind: ConditionalAtRuleKind;
    /** OR-list (ValueList) of AND-groups (Expressions joined by the `and` keyword) */
    features: Value;
    rules: Statement[];
}

/** Any other at-rule. With a body it is rooted: `@font-face`, `@keyframes`. */
export interface AtRule extends NodeBase {
    type: 'AtRule';
    name: string;
    prelude?: Value;
    rules?: Statement[];
}

/** `@detached();` */
export interface DetachedCall extends NodeBase {
    type: 'DetachedCall';
    name: string;
}

export interface ImportOptions {
    /** Definitions become available but produce no output unless used */
    reference: boolean;
    /** Plain CSS import, never inlined */
    css: boolean;
    /** Import the same path again even if already imported */
    multiple: boolean;
}

export interface Import extends NodeBase {
    type: 'Import';
    path: Value;
    options: ImportOptions;
}

export type Statement = Declaration | RuleBlock | MixinDefinition | MixinInvocation | ConditionalAtRule | AtRule | ExtendClause | DetachedCall | Import;

/** Root of a source tree or of the resolved output */
export interface Stylesheet {
    type: 'Stylesheet';
    rules: Statement[];
    pos: SourcePosition;
    visibility: Visibility;
    blocksOutput: boolean;
    parent?: undefined;
}

/** Nodes that own child statements */
export type Container = Stylesheet | RuleBlock | MixinDefinition | ConditionalAtRule | AtRule;

/** Anything the visibility tracker can be asked about */
export type TrackedNode = Stylesheet | Statement;

/** Exhaustiveness check for switches over a node's `type` tag */
export function assertNever(value: never): never {
    const node: { type?: unknown } = value;
    throw new Error(`Unhandled node kind: ${String(node.type)}`);
}
