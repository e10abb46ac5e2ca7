import { Function, isParameterRegister } from '../threeAddressCode/Function';
import { Register, RegisterArena, isEqual as registersEqual } from '../threeAddressCode/Register';
import { Statement } from '../threeAddressCode/Statement';
import { symbolsEqual } from '../threeAddressCode/FunctionSymbol';

type Call = Extract<Statement, { kind: 'call' }>;

const isSelfCall = (f: Function, tas: Statement): tas is Call =>
    tas.kind == 'call' && tas.target.kind == 'function' && symbolsEqual(tas.target.symbol, f.symbol);

// The call's result goes straight to a return, with nothing in between.
const returnsResult = (call: Call, next: Statement | undefined): boolean => {
    if (!next || next.kind != 'return') return false;
    if (call.destination === null || next.register === null) {
        return call.destination === null && next.register === null;
    }
    return registersEqual(call.destination, next.register);
};

export const selfCallIndices = (f: Function): number[] =>
    f.instructions.map((tas, i) => (isSelfCall(f, tas) ? i : -1)).filter(i => i >= 0);

// True when the function calls itself and every such call is a tail call. Partial tail recursion is false.
export const isTailRecursive = (f: Function): boolean => {
    const calls = selfCallIndices(f);
    return (
        calls.length > 0 &&
        calls.every(i => {
            const call = f.instructions[i];
            return isSelfCall(f, call) && returnsResult(call, f.instructions[i + 1]);
        })
    );
};

const loopLabel = (f: Function): string => {
    const taken = new Set(f.instructions.map(tas => (tas.kind == 'label' ? tas.name : '')));
    let label = 'tail_recursion_loop';
    for (let i = 2; taken.has(label); i++) label = `tail_recursion_loop_${i}`;
    return label;
};

// Rebind every parameter to its new argument at once. An argument that reads a parameter about to be
// overwritten is saved first, so later assignments never see a partially updated set.
const rebindParameters = (f: Function, call: Call, arena: RegisterArena, label: string): Statement[] => {
    const overwritten = f.parameters
        .filter((parameter, i) => !registersEqual(call.arguments[i], parameter.register))
        .map(parameter => parameter.register);
    const saves: Statement[] = [];
    const sources: Register[] = call.arguments.map(argument => {
        if (!isParameterRegister(f, argument)) return argument;
        if (!overwritten.some(r => registersEqual(r, argument))) return argument;
        const saved = arena.allocate(argument.type);
        saves.push({ kind: 'move', from: argument, to: saved, why: 'Save old parameter value' });
        return saved;
    });
    const assignments: Statement[] = [];
    f.parameters.forEach((parameter, i) => {
        if (registersEqual(call.arguments[i], parameter.register)) return;
        assignments.push({
            kind: 'move',
            from: sources[i],
            to: parameter.register,
            why: `Rebind ${parameter.name} for the next iteration`,
        });
    });
    return [...saves, ...assignments, { kind: 'goto', label, why: 'Tail call becomes a loop' }];
};

export default (f: Function): Function => {
    if (!f.isTailRecursive) return f;
    const arena = new RegisterArena(f.registers);
    const label = loopLabel(f);
    const instructions: Statement[] = [{ kind: 'label', name: label, why: 'Tail recursion re-enters here' }];
    for (let i = 0; i < f.instructions.length; i++) {
        const tas = f.instructions[i];
        if (isSelfCall(f, tas) && returnsResult(tas, f.instructions[i + 1])) {
            instructions.push(...rebindParameters(f, tas, arena, label));
            i++; // skip the return
        } else {
            instructions.push(tas);
        }
    }
    return { ...f, instructions, registers: arena.registers };
};
