/**
 * WebSocket Protocol Types
 *
 * Defines the messages exchanged between a remote training loop and the
 * environment server.
 */

import type { ObservationBatch, StepResult } from "../../types.js"

// ============================================================================
// Client -> Server Messages
//
// Note: Some messages trigger automatic responses:
// - make_env: Server responds with spec
// - reset: Server responds with observation
// - step: Server responds with step_result
// ============================================================================

export interface EnvOptionsPayload {
  fullObservable?: boolean
  stepCost?: number
  gridWidth?: number
}

/**
 * Create (or replace) the connection's environment.
 * Server responds with: spec
 */
export interface MakeEnvMessage {
  type: "make_env"
  options?: EnvOptionsPayload
}

export interface ResetMessage {
  type: "reset"
}

/**
 * Server responds with: step_result (or error, leaving the env untouched)
 */
export interface StepMessage {
  type: "step"
  actions: number[]
}

export interface RenderMessage {
  type: "render"
  mode: "ansi" | "rgb_array"
}

export interface GetSpecMessage {
  type: "get_spec"
}

export interface CloseMessage {
  type: "close"
}

export type ClientMessage =
  | MakeEnvMessage
  | ResetMessage
  | StepMessage
  | RenderMessage
  | GetSpecMessage
  | CloseMessage

// ============================================================================
// Server -> Client Messages
// ============================================================================

export interface EnvSpec {
  nAgents: number
  actionCount: number
  actionMeanings: string[]
  observationShape: number[]
  gridShape: { rows: number; cols: number }
  maxSteps: number
  goalReward: number
  stepCost: number
  fullObservable: boolean
}

export interface SpecMessage {
  type: "spec"
  spec: EnvSpec
}

export interface ObservationMessage {
  type: "observation"
  observations: ObservationBatch
}

export interface StepResultMessage {
  type: "step_result"
  result: StepResult
}

export interface RenderResultMessage {
  type: "render"
  mode: "ansi" | "rgb_array"
  // ansi: the text grid; rgb_array: base64 of the raw RGB bytes
  data: string
  width?: number
  height?: number
}

export interface ClosedMessage {
  type: "closed"
}

export interface ErrorMessage {
  type: "error"
  message: string
  code?: string
}

export type ServerMessage =
  | SpecMessage
  | ObservationMessage
  | StepResultMessage
  | RenderResultMessage
  | ClosedMessage
  | ErrorMessage

// ============================================================================
// Type Guards
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function isOptionalType(value: unknown, type: "boolean" | "number"): boolean {
  return value === undefined || typeof value === type
}

function isEnvOptionsPayload(value: unknown): value is EnvOptionsPayload {
  if (!isRecord(value)) return false
  return (
    isOptionalType(value.fullObservable, "boolean") &&
    isOptionalType(value.stepCost, "number") &&
    isOptionalType(value.gridWidth, "number")
  )
}

export function isClientMessage(message: unknown): message is ClientMessage {
  if (!isRecord(message) || typeof message.type !== "string") {
    return false
  }

  switch (message.type) {
    case "make_env":
      return message.options === undefined || isEnvOptionsPayload(message.options)
    case "step":
      // Codes are range-checked by the environment itself
      return (
        Array.isArray(message.actions) &&
        message.actions.every((a: unknown) => typeof a === "number")
      )
    case "render":
      return message.mode === "ansi" || message.mode === "rgb_array"
    case "reset":
    case "get_spec":
    case "close":
      return true
    default:
      return false
  }
}

export function validateClientMessage(message: unknown): ClientMessage | null {
  if (!isClientMessage(message)) {
    return null
  }
  return message
}
