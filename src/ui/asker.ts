import { AskerState, Decision } from '../types'

export type AnswerReader = (question: string) => Promise<string>

export interface AskStep {
  state: AskerState
  decision: Decision | null // null means the input was not an answer; ask again
}

export interface AskResult {
  state: AskerState
  decision: Decision
}

export const initialAskerState: AskerState = { cachedDecision: null, lastDecision: null }

function isDecision(value: string): value is Decision {
  return value === 'y' || value === 'n' || value === 'a' || value === 'q'
}

export function formatQuestion(prompt: string, state: AskerState): string {
  const question = `${prompt} [Y]es, [N]o, [A]ll, [Q]uit `
  return state.lastDecision ? `${question}(${state.lastDecision}) ` : question
}

/**
 * Interpret one line of user input. Empty input repeats the previous answer.
 * 'a' and 'q' become the cached decision for the rest of the run.
 */
export function applyAnswer(state: AskerState, rawInput: string): AskStep {
  const normalized = rawInput.trim().toLowerCase()
  const answer = normalized === '' ? state.lastDecision : normalized

  if (answer === null || !isDecision(answer)) {
    return { state, decision: null }
  }

  return {
    state: {
      cachedDecision: answer === 'a' || answer === 'q' ? answer : state.cachedDecision,
      lastDecision: answer,
    },
    decision: answer,
  }
}

export async function ask(
  state: AskerState,
  prompt: string,
  readAnswer: AnswerReader
): Promise<AskResult> {
  if (state.cachedDecision !== null) {
    return { state, decision: state.cachedDecision }
  }

  let current = state
  while (true) {
    const step = applyAnswer(current, await readAnswer(formatQuestion(prompt, current)))
    if (step.decision !== null) {
      return { state: step.state, decision: step.decision }
    }
    current = step.state
  }
}
