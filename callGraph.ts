import { Program } from './threeAddressCode/Program';
import { Function } from './threeAddressCode/Function';
import { FunctionSymbol, symbolToString, symbolsEqual } from './threeAddressCode/FunctionSymbol';

export const callees = (f: Function): FunctionSymbol[] => {
    const result: FunctionSymbol[] = [];
    f.instructions.forEach(tas => {
        if (tas.kind != 'call' || tas.target.kind != 'function') return;
        const { symbol } = tas.target;
        if (!result.some(s => symbolsEqual(s, symbol))) result.push(symbol);
    });
    return result;
};

// A call path from f back to itself, as symbol names starting and ending with f, or null if f can't re-enter itself.
export const recursionCycle = (program: Program, f: Function): string[] | null => {
    const visited = new Set<string>();
    const search = (current: Function, path: string[]): string[] | null => {
        for (const callee of callees(current)) {
            const name = symbolToString(callee);
            if (symbolsEqual(callee, f.symbol)) return [...path, name];
            if (visited.has(name)) continue;
            visited.add(name);
            const next = program.functions.find(g => symbolsEqual(g.symbol, callee));
            if (!next) continue;
            const found = search(next, [...path, name]);
            if (found) return found;
        }
        return null;
    };
    return search(f, [symbolToString(f.symbol)]);
};
