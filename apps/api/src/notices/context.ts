import type { Request } from "express";

export const DEFAULT_SCREEN = "dashboard";

export type ContextResolver = (req: Request) => string;

export const resolveScreen: ContextResolver = (req) => {
  const fromQuery = req.query.screen;
  if (typeof fromQuery === "string" && fromQuery.trim()) return fromQuery.trim();
  const fromHeader = req.get("x-dashboard-screen");
  if (fromHeader && fromHeader.trim()) return fromHeader.trim();
  return DEFAULT_SCREEN;
};
