import { Debugger, errorMessage } from '../utils/debug'
import {
  BuildState,
  haltWithError,
  RunResult,
  Step,
  StepAction,
  StepError,
  StepErrorCode
} from '../types/pipeline.types'

/**
 * Runs build steps in order and unwinds them.
 *
 * The forward pass stops at the first step that halts (or throws). Every
 * step whose `run` was started then gets `cleanup` exactly once, in reverse
 * order, whether the build halted or completed.
 */
export class StepRunner {
  private readonly debug: Debugger

  constructor () {
    this.debug = new Debugger('runner')
  }

  async run (steps: Step[], state: BuildState): Promise<RunResult> {
    const started: Step[] = []
    let action: StepAction = StepAction.CONTINUE

    for (const step of steps) {
      started.push(step)
      this.debug.log(`Running step ${step.name}`)
      try {
        action = await step.run(state)
      } catch (error) {
        action = haltWithError(state, new StepError(
          StepErrorCode.UNEXPECTED_ERROR,
          step.name,
          `Step ${step.name} failed: ${errorMessage(error)}`
        ))
      }
      if (action === StepAction.HALT) {
        this.debug.log('error', `Step ${step.name} halted the build`)
        break
      }
    }

    for (const step of [...started].reverse()) {
      this.debug.log(`Cleaning up step ${step.name}`)
      try {
        await step.cleanup(state)
      } catch (error) {
        this.debug.log('error', `Cleanup of ${step.name} failed: ${errorMessage(error)}`)
        state.ui.error(`Cleanup of ${step.name} failed: ${errorMessage(error)}`)
      }
    }

    return action === StepAction.HALT
      ? { action, error: state.error }
      : { action }
  }
}
