import chalk from 'chalk'

export type Verbosity = 'quiet' | 'normal' | 'verbose'

let verbosity: Verbosity = 'normal'

export const setVerbosity = (level: Verbosity): void => {
	verbosity = level
}

export const styleKV = (label: string, value: string | number): string =>
	`${chalk.magenta(label)}: ${chalk.white(String(value))}`

export const logInfo = (message: string): void => {
	if (verbosity === 'quiet') return
	process.stdout.write(`${message}\n`)
}

export const logDebug = (message: string): void => {
	if (verbosity !== 'verbose') return
	process.stderr.write(`${chalk.gray('DEBUG')} ${message}\n`)
}

export const logWarn = (message: string): void => {
	process.stderr.write(`${chalk.yellow('WARN')} ${message}\n`)
}

export const logError = (message: string): void => {
	process.stderr.write(`${chalk.red('ERROR')} ${message}\n`)
}
