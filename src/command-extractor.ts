// src/command-extractor.ts — Shell commands mentioned in documentation prose

import { COMMAND_LEADINS, looksLikeCommand } from "./heuristics.js";

const BACKTICK_SPAN = /`([^`]+)`/g;

/**
 * Commands in a piece of prose: backtick spans first, then "run ...",
 * "$ ..." and "> ..." lead-ins. Only text that looks like a command is kept.
 */
export function extractCommands(text: string): string[] {
  const commands: string[] = [];
  const add = (candidate: string) => {
    const cmd = candidate.trim();
    if (cmd && looksLikeCommand(cmd) && !commands.includes(cmd)) commands.push(cmd);
  };

  for (const m of text.matchAll(BACKTICK_SPAN)) add(m[1]);
  for (const pattern of COMMAND_LEADINS) {
    for (const m of text.matchAll(pattern)) add(m[1]);
  }
  return commands;
}

/**
 * A line from inside a fenced block, as a command. Prompt markers are dropped;
 * comments and non-command lines yield undefined.
 */
export function commandFromCodeLine(line: string): string | undefined {
  const cmd = line.trim().replace(/^\$\s+/, "");
  if (!cmd || cmd.startsWith("#")) return undefined;
  return looksLikeCommand(cmd) ? cmd : undefined;
}
