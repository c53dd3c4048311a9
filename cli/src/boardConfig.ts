import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { StopConfig } from "@transit-board/core";

const stopSchema = z.object({
  label: z.string().min(1),
  routeId: z.string().min(1),
  stopId: z.string().min(1),
  directionId: z.union([z.literal(0), z.literal(1)]),
  isOrigin: z.boolean().default(false),
});

const groupSchema = z.object({
  title: z.string(),
  stops: z.array(stopSchema).min(1),
});

export const boardConfigSchema = z.object({
  groups: z.array(groupSchema).min(1),
});

export type BoardStopConfig = StopConfig & { label: string };
export type BoardConfig = z.infer<typeof boardConfigSchema>;

export class BoardConfigError extends Error {
  readonly configPath: string;

  constructor(configPath: string, message: string, options?: ErrorOptions) {
    super(`Invalid board configuration ${configPath}: ${message}`, options);
    this.name = "BoardConfigError";
    this.configPath = configPath;
  }
}

export const parseBoardConfig = (raw: unknown, configPath: string): BoardConfig => {
  const parsed = boardConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new BoardConfigError(configPath, details, { cause: parsed.error });
  }
  return parsed.data;
};

export const loadBoardConfig = (configPath: string): BoardConfig => {
  const resolved = path.resolve(configPath);
  let text: string;
  try {
    text = fs.readFileSync(resolved, "utf-8");
  } catch (error) {
    throw new BoardConfigError(resolved, "file could not be read", { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new BoardConfigError(resolved, "file is not valid JSON", { cause: error });
  }
  return parseBoardConfig(raw, resolved);
};
