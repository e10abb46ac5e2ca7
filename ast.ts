import { Type, builtinTypes, pointerTo } from './types';
import { RuntimeFunctionName } from './threeAddressCode/runtime';

// The resolved, type-checked tree the front end hands to the IR builder. Every identifier is
// already resolved and every expression already carries its static type.

export type SourceLocation = { line: number; column: number };
type Located = { sourceLocation?: SourceLocation };

export type BinaryOperator = '+' | '-' | '*' | '/' | '%' | '&' | '|' | '^' | '<<' | '>>';
export type Comparison = '==' | '!=' | '<' | '<=' | '>' | '>=';

export type Callee =
    | { kind: 'function'; name: string }
    | { kind: 'generic'; name: string; typeArguments: Type[] }
    | { kind: 'runtime'; name: RuntimeFunctionName };

export type Expression = Located &
    (
        | { kind: 'number'; value: number; type: Type }
        | { kind: 'boolean'; value: boolean }
        | { kind: 'string'; value: string }
        | { kind: 'identifier'; name: string; type: Type }
        | { kind: 'global'; name: string; type: Type }
        // The front end is a separate program; operators outside BinaryOperator are rejected while lowering.
        | { kind: 'binaryOperation'; operator: string; lhs: Expression; rhs: Expression; type: Type }
        | { kind: 'comparison'; comparison: Comparison; lhs: Expression; rhs: Expression }
        | { kind: 'not'; operand: Expression }
        | { kind: 'call'; callee: Callee; arguments: Expression[]; type: Type }
        | { kind: 'index'; array: string; index: Expression; type: Type }
        | { kind: 'addressOf'; global: string; type: Type }
        | { kind: 'dereference'; pointer: Expression; type: Type }
        | { kind: 'convert'; expression: Expression; type: Type }
        | { kind: 'ternary'; condition: Expression; ifTrue: Expression; ifFalse: Expression; type: Type }
    );

export type AssignmentTarget =
    | { kind: 'variable'; name: string }
    | { kind: 'global'; name: string }
    | { kind: 'index'; array: string; index: Expression }
    | { kind: 'dereference'; pointer: Expression };

export type Statement = Located &
    (
        | { kind: 'declaration'; name: string; type: Type; initializer?: Expression }
        | { kind: 'assignment'; target: AssignmentTarget; expression: Expression }
        | { kind: 'increment'; name: string }
        | { kind: 'decrement'; name: string }
        | { kind: 'expression'; expression: Expression }
        | { kind: 'return'; expression?: Expression }
        | { kind: 'if'; condition: Expression; then: Statement[]; else?: Statement[] }
        | { kind: 'while'; condition: Expression; body: Statement[] }
        | { kind: 'for'; variable: string; type: Type; from: Expression; to: Expression; body: Statement[] }
    );

export type Parameter = { name: string; type: Type };

export type FunctionDeclaration = Located & {
    name: string;
    typeParameters: string[];
    parameters: Parameter[];
    returnType: Type;
    body: Statement[];
    // @smc attribute: ask for the self-modifying calling convention where the target has one.
    smc?: boolean;
};

export type GlobalDeclaration = {
    name: string;
    type: Type;
    initializer?: number | boolean | number[];
};

export type Module = {
    name: string;
    functions: FunctionDeclaration[];
    globals: GlobalDeclaration[];
};

// Constructors for hand-built trees.

export const typeOfExpression = (e: Expression): Type => {
    switch (e.kind) {
        case 'boolean':
        case 'comparison':
        case 'not':
            return builtinTypes.bool;
        case 'string':
            return pointerTo(builtinTypes.string);
        default:
            return e.type;
    }
};

export const num = (value: number, type: Type): Expression => ({ kind: 'number', value, type });
export const bool = (value: boolean): Expression => ({ kind: 'boolean', value });
export const str = (value: string): Expression => ({ kind: 'string', value });
export const id = (name: string, type: Type): Expression => ({ kind: 'identifier', name, type });
export const global = (name: string, type: Type): Expression => ({ kind: 'global', name, type });

export const binary = (operator: BinaryOperator, lhs: Expression, rhs: Expression): Expression => ({
    kind: 'binaryOperation',
    operator,
    lhs,
    rhs,
    type: typeOfExpression(lhs),
});

export const compare = (comparison: Comparison, lhs: Expression, rhs: Expression): Expression => ({
    kind: 'comparison',
    comparison,
    lhs,
    rhs,
});

export const call = (name: string, args: Expression[], type: Type): Expression => ({
    kind: 'call',
    callee: { kind: 'function', name },
    arguments: args,
    type,
});

export const callGeneric = (
    name: string,
    typeArguments: Type[],
    args: Expression[],
    type: Type
): Expression => ({
    kind: 'call',
    callee: { kind: 'generic', name, typeArguments },
    arguments: args,
    type,
});

export const callRuntime = (name: RuntimeFunctionName, args: Expression[]): Statement => ({
    kind: 'expression',
    expression: { kind: 'call', callee: { kind: 'runtime', name }, arguments: args, type: builtinTypes.void },
});

export const convert = (expression: Expression, type: Type): Expression => ({
    kind: 'convert',
    expression,
    type,
});

export const ret = (expression?: Expression): Statement => ({ kind: 'return', expression });

export const assign = (name: string, expression: Expression): Statement => ({
    kind: 'assignment',
    target: { kind: 'variable', name },
    expression,
});

export const local = (name: string, type: Type, initializer?: Expression): Statement => ({
    kind: 'declaration',
    name,
    type,
    initializer,
});

export const ifThen = (condition: Expression, then: Statement[], otherwise?: Statement[]): Statement => ({
    kind: 'if',
    condition,
    then,
    else: otherwise,
});
