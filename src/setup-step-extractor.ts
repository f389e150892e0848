// src/setup-step-extractor.ts — Ordered setup steps from install/setup sections
// List items and "Step N:" lines open a step; the lines that follow extend it.

import type { DocumentOutline, SetupStep, Warning } from "./types.js";
import { ValidationError } from "./types.js";
import { createSetupStep, type SetupStepInput } from "./entities.js";
import { isSetupHeading, STEP_MARKERS } from "./heuristics.js";
import { clip, isInsideFence, parseOutline } from "./markdown-outline.js";
import { commandFromCodeLine, extractCommands } from "./command-extractor.js";

const TITLE_LENGTH = 50;
const SYNTHESIZED_DESCRIPTION_LENGTH = 200;

interface StepDraft {
  title: string;
  description: string;
  commands: string[];
  order: number;
}

/**
 * Extract setup steps from every setup-like section of one file.
 * `startOrder` seeds the order counter; each step takes the next value.
 */
export function extractSetupSteps(
  source: string | DocumentOutline,
  filePath: string = "",
  warnings: Warning[] = [],
  startOrder: number = 0,
): SetupStep[] {
  const outline = typeof source === "string" ? parseOutline(source) : source;
  const drafts: StepDraft[] = [];

  for (const heading of outline.headings) {
    if (!isSetupHeading(heading.text)) continue;
    drafts.push(
      ...stepsFromSection(outline, heading.text, heading.bodyStart, heading.sectionEnd, startOrder + drafts.length),
    );
  }

  const steps: SetupStep[] = [];
  for (const draft of drafts) {
    try {
      steps.push(createSetupStep(draft));
    } catch (err: unknown) {
      if (!(err instanceof ValidationError)) throw err;
      warnings.push({
        level: "warn",
        module: "setup-step-extractor",
        message: `Dropped setup step "${draft.title}": ${err.message}`,
        file: filePath || undefined,
      });
    }
  }
  return steps;
}

function stepsFromSection(
  outline: DocumentOutline,
  heading: string,
  start: number,
  end: number,
  startOrder: number,
): StepDraft[] {
  const section = outline.content.slice(start, end);
  const drafts: StepDraft[] = [];
  const looseCommands: string[] = [];
  let current: StepDraft | null = null;
  let order = startOrder;
  let offset = start;

  for (const rawLine of section.split("\n")) {
    const lineOffset = offset;
    offset += rawLine.length + 1;
    const line = rawLine.trim();
    if (!line) continue;

    if (isInsideFence(outline.fences, lineOffset)) {
      if (line.startsWith("```") || line.startsWith("~~~")) continue;
      const cmd = commandFromCodeLine(line);
      if (!cmd) continue;
      const target = current ? current.commands : looseCommands;
      if (!target.includes(cmd)) target.push(cmd);
      continue;
    }

    const marker = matchStepMarker(line);
    if (marker !== undefined) {
      if (current) drafts.push(current);
      current = {
        title: clip(marker, TITLE_LENGTH),
        description: marker,
        commands: extractCommands(marker),
        order: order++,
      };
    } else if (current) {
      current.description += " " + line;
      for (const cmd of extractCommands(line)) {
        if (!current.commands.includes(cmd)) current.commands.push(cmd);
      }
    } else {
      for (const cmd of extractCommands(line)) {
        if (!looseCommands.includes(cmd)) looseCommands.push(cmd);
      }
    }
  }

  if (current) {
    drafts.push(current);
    return drafts;
  }

  const body = section.trim();
  if (!body) return drafts;
  return [
    {
      title: heading,
      description: clip(body, SYNTHESIZED_DESCRIPTION_LENGTH),
      commands: looseCommands,
      order: startOrder,
    },
  ];
}

function matchStepMarker(line: string): string | undefined {
  for (const marker of STEP_MARKERS) {
    const m = line.match(marker);
    if (m) return m[1];
  }
  return undefined;
}

/** Re-base a step's order, e.g. when merging per-file results. */
export function withOrder(step: SetupStep, order: number): SetupStep {
  const input: SetupStepInput = { ...step, order };
  return createSetupStep(input);
}
