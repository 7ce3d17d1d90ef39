import type { ShapeTable } from "../graph/shape.js";
import { walk } from "../graph/walker.js";
import { ARGS_NODE_FIELDS, type GraphNode, type SlotValue, type SymbolName } from "../types/node.js";
import { SLOT_COUNT, SlotKind } from "../types/slot.js";
import { isLiteral, type Literal } from "../types/value.js";

export interface FormatOptions {
  /** Append node ordinals, extra words and table ordinals. */
  showOffsets?: boolean;
  wordSize?: number;
}

type Work = { type: "node"; node: GraphNode; depth: number } | { type: "line"; text: string };

function indent(depth: number): string {
  return "  ".repeat(depth);
}

function formatSymbol(name: SymbolName): string {
  return typeof name === "string" ? `:${name}` : `:<${name}>`;
}

/**
 * Renders a literal the way it would be written in source.
 */
export function formatLiteral(literal: Literal): string {
  switch (literal.type) {
    case "nil":
      return "nil";
    case "bool":
      return String(literal.value);
    case "int":
      return literal.value.toString();
    case "float":
      return Number.isInteger(literal.value) ? literal.value.toFixed(1) : String(literal.value);
    case "string":
      return JSON.stringify(literal.value);
    case "bytes":
      return `<${literal.value.length} bytes>`;
    case "symbol":
      return `:${literal.name}`;
    case "range":
      return `${formatLiteral(literal.begin)}${literal.exclusive ? "..." : ".."}${formatLiteral(literal.end)}`;
    case "array":
      return `[${literal.items.map(formatLiteral).join(", ")}]`;
    case "hash":
      return `{${literal.entries.map(([k, v]) => `${formatLiteral(k)} => ${formatLiteral(v)}`).join(", ")}}`;
    case "regexp":
      return `/${literal.source}/${literal.flags}`;
  }
}

/**
 * Indented tree dump of a graph, one `@ KIND` line per node and one `>|` line
 * per non-node slot. A node reached a second time is printed as
 * `-> #ordinal KIND` and not expanded again, so shared nodes and cycles print
 * once.
 *
 * @throws SchemaError if the graph does not conform to `shapes`
 */
export function formatGraph(root: GraphNode, shapes: ShapeTable, options: FormatOptions = {}): string {
  const showOffsets = options.showOffsets ?? false;
  const form = walk(root, shapes, { wordSize: options.wordSize });
  const ordinals = new Map<GraphNode, number>();
  const shapeOf = new Map<GraphNode, readonly SlotKind[]>();
  form.nodes.forEach((entry, i) => {
    ordinals.set(entry.node, i);
    shapeOf.set(entry.node, entry.shape);
  });

  const ordinalSuffix = (ordinal: number | undefined): string =>
    showOffsets && ordinal !== undefined ? ` #${ordinal}` : "";

  function slotLine(value: SlotValue, kind: SlotKind): string {
    if (value === null) {
      return ">| (NULL)";
    }
    switch (kind) {
      case SlotKind.RawLong:
        return typeof value === "bigint" ? `>| ${value.toString(16)}` : ">| [UNKNOWN]";
      case SlotKind.Value:
        return isLiteral(value)
          ? `>| VALUE${ordinalSuffix(form.tables.ordinalOf("value", value))}: ${formatLiteral(value)}`
          : ">| [UNKNOWN]";
      case SlotKind.Symbol:
        return typeof value === "string" || typeof value === "number"
          ? `>| SYMBOL${ordinalSuffix(form.tables.ordinalOf("symbol", value))}: ${formatSymbol(value)}`
          : ">| [UNKNOWN]";
      case SlotKind.IdentifierGroup:
        return typeof value === "object" && value.type === "identifierGroup"
          ? `>| IDTABLE: [${value.names.map(formatSymbol).join(", ")}]`
          : ">| [UNKNOWN]";
      case SlotKind.Binding:
        return typeof value === "object" && value.type === "binding"
          ? `>| BINDING: ${formatSymbol(value.name)}`
          : ">| [UNKNOWN]";
      default:
        return ">| [UNKNOWN]";
    }
  }

  const lines: string[] = [];
  const printed = new Set<GraphNode>();
  const stack: Work[] = [{ type: "node", node: root, depth: 0 }];

  for (let work = stack.pop(); work !== undefined; work = stack.pop()) {
    if (work.type === "line") {
      lines.push(work.text);
      continue;
    }

    const { node, depth } = work;
    const ordinal = ordinals.get(node);
    if (printed.has(node)) {
      lines.push(`${indent(depth)}-> #${ordinal} ${node.kind}`);
      continue;
    }
    printed.add(node);
    lines.push(
      showOffsets
        ? `${indent(depth)}@ ${node.kind} #${ordinal} | extra ${node.extra.toString(16)}`
        : `${indent(depth)}@ ${node.kind}`
    );

    const shape = shapeOf.get(node) ?? [];
    const pad = indent(depth + 1);
    const items: Work[] = [];
    for (let i = 0; i < SLOT_COUNT; i++) {
      const value = node.slots[i];
      const kind = shape[i];
      if (kind === SlotKind.ChildNode) {
        items.push(
          value !== null && typeof value === "object" && value.type === "node"
            ? { type: "node", node: value, depth: depth + 1 }
            : { type: "line", text: `${pad}(NULL)` }
        );
      } else if (kind === SlotKind.ArgsRecord && value !== null && typeof value === "object" && value.type === "argsRecord") {
        const symbol = (name: SymbolName | null): string => (name === null ? "-" : formatSymbol(name));
        items.push({
          type: "line",
          text:
            `${pad}>| ARGS${ordinalSuffix(form.tables.ordinalOf("argsRecord", value))}: ` +
            `pre=${value.preArgsNum} post=${value.postArgsNum} firstPost=${symbol(value.firstPostArg)} ` +
            `rest=${symbol(value.restArg)} block=${symbol(value.blockArg)}`,
        });
        for (const field of ARGS_NODE_FIELDS) {
          const target = value[field];
          if (target !== null) {
            items.push({ type: "line", text: `${indent(depth + 2)}${field}:` });
            items.push({ type: "node", node: target, depth: depth + 3 });
          }
        }
      } else {
        items.push({ type: "line", text: `${pad}${slotLine(value, kind)}` });
      }
    }
    for (let i = items.length - 1; i >= 0; i--) {
      stack.push(items[i]);
    }
  }

  return lines.join("\n") + "\n";
}
