/**
 * What a node slot refers to, as declared by a shape table.
 */
export enum SlotKind {
  None = 0,
  RawLong = 1,
  ChildNode = 2,
  Value = 3,
  Symbol = 4,
  IdentifierGroup = 5,
  ArgsRecord = 6,
  Binding = 7,
}

/**
 * Slot discriminant stored in the low nibble of a slot tag byte.
 */
export enum SlotTag {
  None = 0,
  Node = 1,
  Raw = 2,
  Symbol = 3,
  IdentifierGroup = 4,
  ArgsRecord = 5,
  Binding = 6,
  Value = 7,
}

/**
 * Per-kind declaration of the referent kind of each of the three slots.
 */
export type ShapeDescriptor = readonly [SlotKind, SlotKind, SlotKind];

export const SLOT_COUNT = 3;

const SLOT_KIND_VALUES: ReadonlySet<number> = new Set([
  SlotKind.None,
  SlotKind.RawLong,
  SlotKind.ChildNode,
  SlotKind.Value,
  SlotKind.Symbol,
  SlotKind.IdentifierGroup,
  SlotKind.ArgsRecord,
  SlotKind.Binding,
]);

export function isSlotKind(value: unknown): value is SlotKind {
  return typeof value === "number" && SLOT_KIND_VALUES.has(value);
}

export function isSlotTag(value: number): value is SlotTag {
  return Number.isInteger(value) && value >= SlotTag.None && value <= SlotTag.Value;
}

/**
 * Returns the wire tag written for a non-empty slot of the given kind.
 */
export function slotTagFor(kind: SlotKind): SlotTag {
  switch (kind) {
    case SlotKind.None:
      return SlotTag.None;
    case SlotKind.RawLong:
      return SlotTag.Raw;
    case SlotKind.ChildNode:
      return SlotTag.Node;
    case SlotKind.Value:
      return SlotTag.Value;
    case SlotKind.Symbol:
      return SlotTag.Symbol;
    case SlotKind.IdentifierGroup:
      return SlotTag.IdentifierGroup;
    case SlotKind.ArgsRecord:
      return SlotTag.ArgsRecord;
    case SlotKind.Binding:
      return SlotTag.Binding;
  }
}

export function slotKindName(kind: SlotKind): string {
  return SlotKind[kind];
}
