import { Scalar, toString as typeToString } from '../types';

export type Register = { id: number; type: Scalar };

export const toString = (r: Register): string => `r${r.id}`;
export const toStringWithType = (r: Register): string => `r${r.id}:${typeToString(r.type)}`;

export const isEqual = (lhs: Register, rhs: Register): boolean => lhs.id == rhs.id;

// Registers of one function. Ids start at 1, are stable, and mean nothing outside the function that owns the arena.
export class RegisterArena {
    private readonly table: Register[];

    constructor(existing: Register[] = []) {
        this.table = [...existing];
    }

    allocate(type: Scalar): Register {
        const register = { id: this.table.length + 1, type };
        this.table.push(register);
        return register;
    }

    get registers(): Register[] {
        return [...this.table];
    }
}
