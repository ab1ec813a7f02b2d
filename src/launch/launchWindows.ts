import { addMonths, inRange } from "../lib/dates";

export type LaunchWindows = {
  pre: { start: string; end: string };
  post: { start: string; end: string };
};

/** Symmetric half-open windows of `months` on each side of the launch date. */
export function buildLaunchWindows(launchDate: string, months: number): LaunchWindows {
  return {
    pre: { start: addMonths(launchDate, -months), end: launchDate },
    post: { start: launchDate, end: addMonths(launchDate, months) },
  };
}

export function inWindow(date: string, window: { start: string; end: string }): boolean {
  return inRange(date, window.start, window.end);
}
