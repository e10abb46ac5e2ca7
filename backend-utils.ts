import { Program } from './threeAddressCode/Program';
import { Function } from './threeAddressCode/Function';
import { symbolToString } from './threeAddressCode/FunctionSymbol';
import { Scalar, valueBits } from './types';
import { TargetName, TargetDescriptor, Feature, targets } from './TargetDescriptor';
import { CompileError } from './CompileError';
import { Backend, EmitOptions, EmitResult } from './api';
import { recursionCycle } from './callGraph';
import unhandled from './util/never';

import cBackend from './backends/c';
import z80Backend from './backends/z80';
import mos6502Backend from './backends/mos6502';
import m68kBackend from './backends/m68k';
import ssaBackend from './backends/ssa';

export const backendFor = (target: TargetName): Backend => {
    switch (target) {
        case 'c99':
            return cBackend;
        case 'z80-smc':
            return z80Backend;
        case 'mos6502':
            return mos6502Backend;
        case 'm68k':
            return m68kBackend;
        case 'llvm':
            return ssaBackend;
        default:
            return unhandled(target, 'backendFor');
    }
};

const typeFeatures = (type: Scalar): Feature[] => {
    switch (type.kind) {
        case 'Integer':
            return type.bits > 16 ? ['integer32'] : [];
        case 'FixedPoint': {
            const bits = valueBits(type);
            return bits !== null && bits > 16 ? ['fixedPoint', 'integer32'] : ['fixedPoint'];
        }
        case 'Pointer':
            return ['pointers'];
        case 'Boolean':
            return [];
        default:
            return unhandled(type, 'typeFeatures');
    }
};

// Features a function needs from its target, in a stable order.
export const requiredFeatures = (f: Function): Feature[] => {
    const needed = new Set<Feature>();
    if (f.convention == 'smc') needed.add('smc');
    f.registers.forEach(r => typeFeatures(r.type).forEach(feature => needed.add(feature)));
    const order: Feature[] = ['smc', 'integer32', 'fixedPoint', 'pointers'];
    return order.filter(feature => needed.has(feature));
};

export const checkCapabilities = (program: Program, target: TargetDescriptor): CompileError[] => {
    const errors: CompileError[] = [];
    program.functions.forEach(f => {
        const name = symbolToString(f.symbol);
        requiredFeatures(f)
            .filter(feature => !target.features.includes(feature))
            .forEach(feature => errors.push({ kind: 'missingCapability', function: name, target: target.name, feature }));
        if (f.convention == 'smc' && target.supportsSmc) {
            const cycle = recursionCycle(program, f);
            if (cycle) errors.push({ kind: 'conventionConflict', function: name, cycle });
        }
    });
    return errors;
};

// Check the program against the target, then hand all of it to that target's emitter unchanged.
export const emit = (program: Program, target: TargetName, options: EmitOptions): EmitResult => {
    const errors = checkCapabilities(program, targets[target]);
    if (errors.length > 0) return { errors };
    return backendFor(target).emit(program, options);
};
