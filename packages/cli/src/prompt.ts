/**
 * civic-ledger CLI - Confirmation Prompt
 *
 * Asks y/n before a migration run writes to storage. Skipped when --yes is
 * passed or stdin is not a TTY.
 */

import * as readline from "node:readline"

export interface ConfirmOptions {
	readonly message: string
	/** Set by --yes */
	readonly assumeYes?: boolean
	/** Answer used when the user just presses Enter (defaults to false) */
	readonly defaultAnswer?: boolean
}

export interface ConfirmResult {
	readonly confirmed: boolean
	readonly skipped: boolean
	readonly skipReason?: "assume-yes" | "non-tty"
}

/**
 * Signature of {@link confirm}; commands accept a replacement for tests.
 */
export type Confirm = (options: ConfirmOptions) => Promise<ConfirmResult>

function readLine(prompt: string): Promise<string> {
	return new Promise((resolve) => {
		const rl = readline.createInterface({
			input: process.stdin,
			output: process.stdout,
		})

		rl.question(prompt, (answer) => {
			rl.close()
			resolve(answer.trim().toLowerCase())
		})
	})
}

/**
 * Map an answer to a boolean; empty input takes the default, anything other
 * than y/yes/n/no is null.
 */
export function parseAnswer(
	answer: string,
	defaultAnswer: boolean,
): boolean | null {
	switch (answer.trim().toLowerCase()) {
		case "":
			return defaultAnswer
		case "y":
		case "yes":
			return true
		case "n":
		case "no":
			return false
		default:
			return null
	}
}

/**
 * Prompt until the user gives a y/n answer.
 *
 * Non-interactive runs (CI, piped input) proceed as if confirmed.
 */
export const confirm: Confirm = async (options) => {
	const { message, assumeYes = false, defaultAnswer = false } = options

	if (assumeYes) {
		return { confirmed: true, skipped: true, skipReason: "assume-yes" }
	}
	if (process.stdin.isTTY !== true) {
		return { confirmed: true, skipped: true, skipReason: "non-tty" }
	}

	const prompt = `${message} ${defaultAnswer ? "[Y/n]" : "[y/N]"} `
	while (true) {
		const parsed = parseAnswer(await readLine(prompt), defaultAnswer)
		if (parsed !== null) {
			return { confirmed: parsed, skipped: false }
		}
		console.log("Please answer 'y' or 'n'.")
	}
}
