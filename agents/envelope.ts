import { PipelineError, PipelineErrorDetail } from "./errors";
import { deepFreeze } from "./freeze";
import { StagePayload } from "./types";

export type EnvelopeStatus = "success" | "partial" | "error";

interface EnvelopeBase {
  readonly sender: string;
  readonly timestamp: string;
}

export interface SuccessEnvelope<T extends StagePayload> extends EnvelopeBase {
  readonly status: "success";
  readonly payload: T;
}

export interface PartialEnvelope<T extends StagePayload> extends EnvelopeBase {
  readonly status: "partial";
  readonly payload: T;
  readonly notes: readonly string[];
}

export interface ErrorEnvelope extends EnvelopeBase {
  readonly status: "error";
  readonly error: PipelineErrorDetail;
}

export type Envelope<T extends StagePayload> =
  | SuccessEnvelope<T>
  | PartialEnvelope<T>
  | ErrorEnvelope;

export function wrap<T extends StagePayload>(
  sender: string,
  payload: T
): SuccessEnvelope<T> {
  return Object.freeze({
    sender,
    timestamp: new Date().toISOString(),
    status: "success",
    payload: deepFreeze(payload),
  });
}

export function wrapPartial<T extends StagePayload>(
  sender: string,
  payload: T,
  notes: readonly string[]
): PartialEnvelope<T> {
  return Object.freeze({
    sender,
    timestamp: new Date().toISOString(),
    status: "partial",
    payload: deepFreeze(payload),
    notes: Object.freeze([...notes]),
  });
}

export function wrapError(sender: string, error: PipelineError): ErrorEnvelope {
  return Object.freeze({
    sender,
    timestamp: new Date().toISOString(),
    status: "error",
    error: deepFreeze(error.toDetail()),
  });
}

export function envelopeNotes(envelope: Envelope<StagePayload>): readonly string[] {
  return envelope.status === "partial" ? envelope.notes : [];
}
