import { promises as fs } from "node:fs";
import path from "node:path";

const pad = (n: number) => String(n).padStart(2, "0");

/** `<dir>/report_<MMDD>_<HHMMSS>.md`: month and day of the analyzed date, time of writing. */
export function reportPath(dir: string, date: string, now: Date = new Date()) {
  const monthDay = date.slice(5, 7) + date.slice(8, 10);
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return path.join(dir, `report_${monthDay}_${time}.md`);
}

export function renderReport(date: string, text: string, now: Date = new Date()) {
  return [`# Experiment Report - ${date}`, "", `*Generated: ${now.toISOString()}*`, "", "---", "", text].join("\n");
}

export async function writeReport(dir: string, date: string, text: string, now: Date = new Date()) {
  const file = reportPath(dir, date, now);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, renderReport(date, text, now), "utf8");
  return file;
}
