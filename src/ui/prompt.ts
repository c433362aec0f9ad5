import inquirer from 'inquirer'
import { AnswerReader } from './asker'

/**
 * Read one line of free text from the terminal
 */
export const readTerminalAnswer: AnswerReader = async (question) => {
  const { answer } = await inquirer.prompt<{ answer: string }>([
    {
      type: 'input',
      name: 'answer',
      message: question.trimEnd(),
      prefix: '',
    },
  ])
  return answer
}
