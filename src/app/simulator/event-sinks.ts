import { JsonlLogger, toJsonObject } from "../../core/logger.js";

import type { SimulationEvent } from "./events.js";
import type { EventSink } from "./ports.js";

// =============================================================================
// SINKS
// =============================================================================

/** Appends every engine event to a JSONL file, one object per line. */
export class JsonlEventSink implements EventSink {
  private readonly logger: JsonlLogger;

  constructor(filePath: string, runId: string) {
    this.logger = new JsonlLogger(filePath, { runId });
  }

  get filePath(): string {
    return this.logger.filePath;
  }

  emit(event: SimulationEvent): void {
    const { type, ...fields } = event;
    this.logger.log({ ...toJsonObject(fields), type });
  }

  close(): void {
    this.logger.close();
  }
}

/** Forwards events to a callback; used by the CLI to print the live trace. */
export class CallbackEventSink implements EventSink {
  constructor(private readonly onEvent: (event: SimulationEvent) => void) {}

  emit(event: SimulationEvent): void {
    this.onEvent(event);
  }
}
