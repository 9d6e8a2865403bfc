import { SubmissionState } from '@orebm/dto'
import { countTransition } from '../utils/metrics'

export class SubmissionMachine {
  private ALLOWED: Record<SubmissionState, SubmissionState[]> = {
    SENT:    [SubmissionState.LANDED, SubmissionState.DROPPED],
    LANDED:  [],
    DROPPED: []
  }

  can(from: SubmissionState, to: SubmissionState) {
    return this.ALLOWED[from].includes(to)
  }

  isTerminal(state: SubmissionState) {
    return this.ALLOWED[state].length === 0
  }

  /** Checks and counts a move; throws on an illegal one. */
  transition(from: SubmissionState, to: SubmissionState): SubmissionState {
    if (!this.can(from, to)) throw new Error(`illegal submission transition ${from} -> ${to}`)
    countTransition(from, to)
    return to
  }
}
