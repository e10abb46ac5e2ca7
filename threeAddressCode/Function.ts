import { Register, toStringWithType as registerToString } from './Register';
import { Statement, toString as statementToString } from './Statement';
import { FunctionSymbol, symbolToString } from './FunctionSymbol';
import { Type, toString as typeToString } from '../types';
import join from '../util/join';

export type CallingConvention = 'standard' | 'smc';

export type Parameter = { name: string; register: Register };
// Debug information only; the IR addresses values through registers.
export type Local = { name: string; type: Type; register: Register };

export type Function = {
    symbol: FunctionSymbol;
    parameters: Parameter[];
    returnType: Type;
    locals: Local[];
    // Register arena of this function, indexed by id - 1.
    registers: Register[];
    instructions: Statement[];
    smcRequested: boolean;
    // Set by the optimizer pipeline.
    isTailRecursive: boolean;
    convention: CallingConvention;
};

const flags = (f: Function): string => {
    const result: string[] = [];
    if (f.isTailRecursive) result.push('tail-recursive');
    if (f.convention == 'smc') result.push('smc');
    return result.length > 0 ? ` [${join(result, ', ')}]` : '';
};

export const toString = (f: Function): string => {
    const params = join(
        f.parameters.map(p => `${p.name} ${registerToString(p.register)}`),
        ', '
    );
    return join(
        [
            `(function) ${symbolToString(f.symbol)}(${params}): ${typeToString(f.returnType)}${flags(f)}`,
            ...f.instructions.map(statementToString),
        ],
        '\n'
    );
};

export const isParameterRegister = (f: Function, r: Register): boolean =>
    f.parameters.some(p => p.register.id == r.id);
