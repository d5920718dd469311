import type { NormalizedSnapshot } from "../models/domain";

const pushSection = (lines: string[], title: string, items: readonly string[]) => {
  if (items.length === 0) return;
  lines.push(`${title} (${items.length} items):`);
  items.forEach((item) => lines.push(`   • ${item}`));
};

/** Plain-text rendering used by `/transit?format=text`. */
export const formatForDisplay = (snapshot: NormalizedSnapshot, dataSource: string): string => {
  const lines = [`TRAIN: ${snapshot.trainLabel}`, "-".repeat(30), `Status: ${snapshot.status}`];
  if (snapshot.statusType === "scheduled_maintenance") {
    lines.push("   This is scheduled maintenance/construction work");
  }
  lines.push(`Active trips: ${snapshot.activeTrips}`);
  pushSection(lines, "Planned Work", snapshot.plannedWork);
  pushSection(lines, "Service Changes", snapshot.serviceChanges);
  pushSection(lines, "Delays", snapshot.delays);
  return `${lines.join("\n")}\n\nData source: ${dataSource}`;
};
