import type { EventBus } from "../events/event-bus.js";

export type WarningSink = (message: string, source?: string) => void;

export const formatWarning = (message: string, source?: string): string =>
  source ? `[${source}] ${message}` : message;

/** Routes `warning.raised` events to `sink`; returns the unsubscribe handle. */
export const forwardWarnings = (bus: EventBus, sink: WarningSink): (() => void) =>
  bus.subscribeSafe("warning.raised", ({ message, source }) => {
    sink(message, source);
  });
