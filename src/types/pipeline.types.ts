/**
 * Pipeline type definitions shared by the step runner and the steps.
 */

import { Driver, Template } from './driver.types'

/**
 * Output sink for human-readable progress
 */
export interface Ui {
  say (message: string): void
  error (message: string): void
}

/**
 * State shared by every step of one build.
 *
 * Steps read what earlier steps wrote and write what later steps (and their
 * own cleanup) need.
 */
export interface BuildState {
  ui: Ui
  driver: Driver
  /** Server to build templates from, set by a provisioning step */
  serverUuid?: string
  /** Storage UUIDs to delete during cleanup, in creation order */
  cleanupStorageUuids?: string[]
  /** Templates created so far, in creation order */
  templates?: Template[]
  /** Error that halted the build */
  error?: Error
}

/**
 * Outcome of a step's forward action
 */
export enum StepAction {
  CONTINUE = 'continue',
  HALT = 'halt'
}

/**
 * One build step: a forward action plus its compensating cleanup.
 */
export interface Step {
  readonly name: string
  run (state: BuildState): Promise<StepAction>
  /** Must not throw; reports problems through state.ui */
  cleanup (state: BuildState): Promise<void>
}

/**
 * Result of running a list of steps
 */
export interface RunResult {
  action: StepAction
  error?: Error
}

/**
 * Step error codes
 */
export enum StepErrorCode {
  /** A value an earlier step should have written is missing */
  MISSING_STATE = 'MISSING_STATE',
  /** A step threw instead of halting */
  UNEXPECTED_ERROR = 'UNEXPECTED_ERROR'
}

/**
 * Error class for step failures that do not come from the driver
 */
export class StepError extends Error {
  readonly code: StepErrorCode
  readonly step: string

  constructor (code: StepErrorCode, step: string, message: string) {
    super(message)
    this.name = 'StepError'
    this.code = code
    this.step = step
  }
}

/**
 * Error raised when a build halts
 */
export class BuildError extends Error {
  /** State of the build at the point it stopped */
  readonly state: BuildState

  constructor (message: string, state: BuildState, cause?: Error) {
    super(message, cause ? { cause } : undefined)
    this.name = 'BuildError'
    this.state = state
  }
}

/**
 * Records `error` on the state, reports it and tells the runner to stop.
 */
export function haltWithError (state: BuildState, error: Error): StepAction {
  state.error = error
  state.ui.error(error.message)
  return StepAction.HALT
}
