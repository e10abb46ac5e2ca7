import deepEqual from 'deep-equal';
import { Type, shortName } from '../types';

// Structured symbol. Only turned into text by symbolToString, at the emission boundary.
export type FunctionSymbol = {
    module: string;
    name: string;
    // Empty for ordinary functions; the concrete types an instantiation is mangled with.
    mangling: Type[];
};

export const symbolToString = ({ module, name, mangling }: FunctionSymbol): string =>
    [`${module}_${name}`, ...mangling.map(shortName)].join('$');

export const symbolsEqual = (a: FunctionSymbol, b: FunctionSymbol): boolean =>
    deepEqual(a, b, { strict: true });
