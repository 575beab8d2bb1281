import type { SourcePosition } from '../tree/types';

export type EvaluationErrorKind = 'UndefinedMixin' | 'NoMatchingGuard' | 'UndefinedVariable' | 'InvalidOperationType' | 'ImportResolutionFailure' | 'RecursionLimit';

/**
 * Fatal evaluation failure. The first one raised aborts `evaluate()`;
 * no partial output is returned.
 */
export class EvaluationError extends Error {
    readonly kind: EvaluationErrorKind;
    readonly position: SourcePosition;
    /** The offending construct as written, e.g. `.m(1, 2)` or `@missing` */
    readonly construct: string;

    constructor(kind: EvaluationErrorKind, message: string, position: SourcePosition, construct: string, options?: { cause?: unknown }) {
        super(`${message} (${formatPosition(position)})`, options);
        this.name = 'EvaluationError';
        this.kind = kind;
        this.position = position;
        this.construct = construct;
    }
}

export function formatPosition(pos: SourcePosition): string {
    return `${pos.file ?? '<input>'}:${pos.line}:${pos.column}`;
}

export function isEvaluationError(error: unknown): error is EvaluationError {
    return error instanceof EvaluationError;
}

/** Log a non-fatal problem as `[tessera] message (file:line:column)` */
export function warn(message: string, pos?: SourcePosition): void {
    console.warn(pos ? `[tessera] ${message} (${formatPosition(pos)})` : `[tessera] ${message}`);
}
