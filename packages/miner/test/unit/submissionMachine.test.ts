import { SubmissionState } from '@orebm/dto'
import { SubmissionMachine } from '../../src/fsm/submissionMachine'

describe('SubmissionMachine', () => {
  const fsm = new SubmissionMachine()

  test('SENT resolves to LANDED or DROPPED', () => {
    expect(fsm.can(SubmissionState.SENT, SubmissionState.LANDED)).toBe(true)
    expect(fsm.can(SubmissionState.SENT, SubmissionState.DROPPED)).toBe(true)
  })

  test('terminal states do not move', () => {
    expect(fsm.isTerminal(SubmissionState.LANDED)).toBe(true)
    expect(fsm.isTerminal(SubmissionState.DROPPED)).toBe(true)
    expect(fsm.isTerminal(SubmissionState.SENT)).toBe(false)
    expect(() => fsm.transition(SubmissionState.DROPPED, SubmissionState.LANDED)).toThrow('illegal submission transition DROPPED -> LANDED')
  })
})
