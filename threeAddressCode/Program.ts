import { Function, toString as functionToString } from './Function';
import { FunctionSymbol, symbolsEqual } from './FunctionSymbol';
import { Type, toString as typeToString } from '../types';
import join from '../util/join';

export type GlobalVariable = {
    module: string;
    name: string;
    type: Type;
    // Booleans are stored as 0 or 1. Arrays take one value per element.
    initializer?: number | number[];
};

export type StringLiteral = { index: number; value: string };

export type Program = {
    module: string;
    // Declaration order, followed by instantiations in the order they were first requested.
    functions: Function[];
    globals: GlobalVariable[];
    stringLiterals: StringLiteral[];
};

export const stringLiteralName = ({ index }: Pick<StringLiteral, 'index'>): string => `str_${index}`;
export const globalName = ({ module, name }: { module: string; name: string }): string => `${module}.${name}`;

export const findFunction = (program: Program, symbol: FunctionSymbol): Function | undefined =>
    program.functions.find(f => symbolsEqual(f.symbol, symbol));

const globalToString = (g: GlobalVariable): string => {
    const init = g.initializer === undefined ? '' : ` = ${JSON.stringify(g.initializer)}`;
    return `(global) ${globalName(g)}: ${typeToString(g.type)}${init}`;
};

export const toString = ({ globals, functions, stringLiterals }: Program): string =>
    join(
        [
            ...stringLiterals.map(s => `(string) ${stringLiteralName(s)}: ${JSON.stringify(s.value)}`),
            ...globals.map(globalToString),
            ...functions.map(functionToString),
        ],
        '\n\n'
    );
