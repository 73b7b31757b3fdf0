import { splitPhysicalLines } from "../requirements/line-classifier.js";

// =============================================================================
// TYPES
// =============================================================================

type DiffTag = " " | "-" | "+";

type DiffOp = {
  tag: DiffTag;
  text: string;
  // Lines of each side consumed before this op.
  oldIndex: number;
  newIndex: number;
};

const DEFAULT_CONTEXT = 3;

// =============================================================================
// PUBLIC API
// =============================================================================

/** Line-based unified diff; "" when the texts are equal. */
export function buildUnifiedDiff(input: {
  path: string;
  before: string;
  after: string;
  context?: number;
}): string {
  const beforeLines = toLines(input.before);
  const afterLines = toLines(input.after);
  const ops = diffLines(beforeLines, afterLines);
  const hunks = groupHunks(ops, input.context ?? DEFAULT_CONTEXT);
  if (hunks.length === 0) {
    return "";
  }

  const lines: string[] = [];
  lines.push(`--- ${input.path} (old)`);
  lines.push(`+++ ${input.path} (new)`);

  for (const hunk of hunks) {
    const [first] = hunk;
    if (!first) continue;
    const oldLength = hunk.filter((op) => op.tag !== "+").length;
    const newLength = hunk.filter((op) => op.tag !== "-").length;
    lines.push(
      `@@ -${formatRange(first.oldIndex, oldLength)} +${formatRange(first.newIndex, newLength)} @@`,
    );
    for (const op of hunk) {
      lines.push(`${op.tag}${op.text}`);
    }
  }

  return `${lines.join("\n")}\n`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function toLines(text: string): string[] {
  return splitPhysicalLines(text).map((line) => line.text);
}

// Longest common subsequence; requirement files are small enough for the full table.
function diffLines(before: string[], after: string[]): DiffOp[] {
  const rows = before.length + 1;
  const cols = after.length + 1;
  const table = new Uint32Array(rows * cols);

  for (let i = before.length - 1; i >= 0; i -= 1) {
    for (let j = after.length - 1; j >= 0; j -= 1) {
      table[i * cols + j] =
        before[i] === after[j]
          ? (table[(i + 1) * cols + j + 1] ?? 0) + 1
          : Math.max(table[(i + 1) * cols + j] ?? 0, table[i * cols + j + 1] ?? 0);
    }
  }

  const ops: DiffOp[] = [];
  let i = 0;
  let j = 0;
  while (i < before.length || j < after.length) {
    const oldLine = before[i];
    const newLine = after[j];
    if (oldLine !== undefined && newLine !== undefined && oldLine === newLine) {
      ops.push({ tag: " ", text: oldLine, oldIndex: i, newIndex: j });
      i += 1;
      j += 1;
    } else if (
      oldLine !== undefined &&
      (newLine === undefined || (table[(i + 1) * cols + j] ?? 0) >= (table[i * cols + j + 1] ?? 0))
    ) {
      ops.push({ tag: "-", text: oldLine, oldIndex: i, newIndex: j });
      i += 1;
    } else if (newLine !== undefined) {
      ops.push({ tag: "+", text: newLine, oldIndex: i, newIndex: j });
      j += 1;
    }
  }

  return ops;
}

function groupHunks(ops: DiffOp[], context: number): DiffOp[][] {
  const ranges: Array<{ start: number; end: number }> = [];

  ops.forEach((op, index) => {
    if (op.tag === " ") return;
    const start = Math.max(0, index - context);
    const end = Math.min(ops.length, index + context + 1);
    const last = ranges[ranges.length - 1];
    if (last && start <= last.end) {
      last.end = Math.max(last.end, end);
    } else {
      ranges.push({ start, end });
    }
  });

  return ranges.map((range) => ops.slice(range.start, range.end));
}

function formatRange(start: number, length: number): string {
  if (length === 1) return `${start + 1}`;
  if (length === 0) return `${start},0`;
  return `${start + 1},${length}`;
}
