// Reserved and unassigned bits are left alone; the format tells readers to ignore them.

export const ClassAccessFlag = {
    Public: 0x0001,
    Final: 0x0010,
    Super: 0x0020,
    Interface: 0x0200,
    Abstract: 0x0400,
    Synthetic: 0x1000,
    Annotation: 0x2000,
    Enum: 0x4000,
    Module: 0x8000,
} as const;

export const FieldAccessFlag = {
    Public: 0x0001,
    Private: 0x0002,
    Protected: 0x0004,
    Static: 0x0008,
    Final: 0x0010,
    Volatile: 0x0040,
    Transient: 0x0080,
    Synthetic: 0x1000,
    Enum: 0x4000,
} as const;

export const MethodAccessFlag = {
    Public: 0x0001,
    Private: 0x0002,
    Protected: 0x0004,
    Static: 0x0008,
    Final: 0x0010,
    Synchronized: 0x0020,
    Bridge: 0x0040,
    VarArgs: 0x0080,
    Native: 0x0100,
    Abstract: 0x0400,
    Strict: 0x0800,
    Synthetic: 0x1000,
} as const;

export const InnerClassAccessFlag = {
    Public: 0x0001,
    Private: 0x0002,
    Protected: 0x0004,
    Static: 0x0008,
    Final: 0x0010,
    Interface: 0x0200,
    Abstract: 0x0400,
    Synthetic: 0x1000,
    Annotation: 0x2000,
    Enum: 0x4000,
} as const;

/** Flags of MethodParameters entries. */
export const ParameterAccessFlag = {
    Final: 0x0010,
    Synthetic: 0x1000,
    Mandated: 0x8000,
} as const;

export const ModuleAccessFlag = {
    Open: 0x0020,
    Synthetic: 0x1000,
    Mandated: 0x8000,
} as const;

export const RequiresAccessFlag = {
    Transitive: 0x0020,
    StaticPhase: 0x0040,
    Synthetic: 0x1000,
    Mandated: 0x8000,
} as const;

export type FlagTable = Readonly<Record<string, number>>;

export function hasFlag(mask: number, flag: number): boolean {
    return (mask & flag) === flag;
}

/**
 * Names of the flags set in `mask`, in table order.
 * e.g. flagNames(0x0021, ClassAccessFlag) -> ['Public', 'Super']
 */
export function flagNames(mask: number, table: FlagTable): string[] {
    return Object.entries(table)
        .filter(([, flag]) => hasFlag(mask, flag))
        .map(([name]) => name);
}
