import { Type, builtinTypes, pointerTo } from '../types';

// Runtime support routines. Every target links its own implementation; the compiler only lowers calls to them.
export type RuntimeFunctionName =
    | 'print_char'
    | 'print_u8'
    | 'print_u16'
    | 'print_u24'
    | 'print_u32'
    | 'print_i8'
    | 'print_i16'
    | 'print_i24'
    | 'print_i32'
    | 'print_bool'
    | 'print_newline'
    | 'print_string';

export type RuntimeFunction = { name: RuntimeFunctionName; parameters: Type[] };

const { u8, u16, u24, u32, i8, i16, i24, i32, bool, string } = builtinTypes;

export const runtimeFunctions: { [N in RuntimeFunctionName]: RuntimeFunction } = {
    print_char: { name: 'print_char', parameters: [u8] },
    print_u8: { name: 'print_u8', parameters: [u8] },
    print_u16: { name: 'print_u16', parameters: [u16] },
    print_u24: { name: 'print_u24', parameters: [u24] },
    print_u32: { name: 'print_u32', parameters: [u32] },
    print_i8: { name: 'print_i8', parameters: [i8] },
    print_i16: { name: 'print_i16', parameters: [i16] },
    print_i24: { name: 'print_i24', parameters: [i24] },
    print_i32: { name: 'print_i32', parameters: [i32] },
    print_bool: { name: 'print_bool', parameters: [bool] },
    print_newline: { name: 'print_newline', parameters: [] },
    print_string: { name: 'print_string', parameters: [pointerTo(string)] },
};

export const allRuntimeFunctions: RuntimeFunction[] = Object.values(runtimeFunctions);
