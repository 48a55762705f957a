/**
 * Planner decision parsing.
 *
 * The planner answers in three labelled segments:
 *
 *   THOUGHT: ...
 *   DECISION: PROCEED | FINISH
 *   INSTRUCTION: ...
 *
 * Parsing is lenient and never throws: a malformed answer still yields an
 * instruction so the turn can go ahead.
 */

export type DecisionKind = 'PROCEED' | 'FINISH';

export interface PlannerDecision {
  thought?: string;
  decision: DecisionKind;
  instruction: string;
  raw: string;
}

const SEGMENT_LABELS = ['THOUGHT:', 'DECISION:', 'INSTRUCTION:'];

/**
 * Text after `label` up to the next segment label (or the end).
 */
function segment(text: string, label: string): string | null {
  const start = text.indexOf(label);
  if (start === -1) return null;
  const from = start + label.length;
  let end = text.length;
  for (const other of SEGMENT_LABELS) {
    if (other === label) continue;
    const at = text.indexOf(other, from);
    if (at !== -1 && at < end) end = at;
  }
  return text.slice(from, end).trim();
}

export function parsePlannerDecision(text: string): PlannerDecision {
  const decisionSegment = segment(text, 'DECISION:');
  const decision: DecisionKind = decisionSegment?.toUpperCase().includes('FINISH') ? 'FINISH' : 'PROCEED';

  const start = text.indexOf('INSTRUCTION:');
  let instruction = start === -1 ? '' : text.slice(start + 'INSTRUCTION:'.length).trim();
  if (!instruction) {
    const lines = text.split('\n').map((line) => line.trim()).filter(Boolean);
    instruction = lines.at(-1) ?? text.trim();
  }

  const thought = segment(text, 'THOUGHT:');
  return {
    ...(thought ? { thought } : {}),
    decision,
    instruction,
    raw: text,
  };
}
