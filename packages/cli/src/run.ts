import { DEFAULT_QUALITY, convertFile } from '@imgconv/convert'
import { formatFromPath, type CodecError } from '@imgconv/core'
import { Command, CommanderError, InvalidArgumentError } from 'commander'
import { logDebug, logError, logInfo, logWarn, setVerbosity, styleKV } from './logger'

const VERSION = '0.1.0'

/**
 * Process exit codes
 */
export const ExitCode = {
	OK: 0,
	USAGE: 1,
	UNKNOWN_INPUT_FORMAT: 2,
	UNKNOWN_OUTPUT_FORMAT: 3,
	LOAD_FAILED: 4,
	SAVE_FAILED: 5,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

interface CliOptions {
	quality?: number
	verbose?: boolean
	quiet?: boolean
}

const FORMATS_HELP = `
Formats (chosen by file extension):
  .bmp          24-bit uncompressed bitmap
  .ppm          portable pixmap (reads P3 and P6, writes P6)
  .jpg, .jpeg   baseline JPEG
`

const parseQuality = (value: string): number => {
	const numeric = Number(value)
	if (!Number.isInteger(numeric) || numeric < 1 || numeric > 100) {
		throw new InvalidArgumentError('Quality must be an integer between 1 and 100.')
	}
	return numeric
}

const logReason = (error: CodecError): void => {
	logDebug(styleKV(error.kind === 'io' ? 'I/O error' : 'Format error', error.message))
}

/**
 * Convert inFile into outFile and report the result
 */
function convertCommand(inFile: string, outFile: string, opts: CliOptions): ExitCode {
	setVerbosity(opts.verbose ? 'verbose' : opts.quiet ? 'quiet' : 'normal')

	if (opts.quality !== undefined && formatFromPath(outFile) !== 'jpeg') {
		logWarn('--quality only applies to JPEG output; ignoring it.')
	}

	logDebug(styleKV('Input', inFile))
	logDebug(styleKV('Output', outFile))

	const outcome = convertFile(inFile, outFile, { quality: opts.quality })
	switch (outcome.status) {
		case 'unknown-input-format':
			logError('Unknown format of the input file')
			return ExitCode.UNKNOWN_INPUT_FORMAT

		case 'unknown-output-format':
			logError('Unknown format of the output file')
			return ExitCode.UNKNOWN_OUTPUT_FORMAT

		case 'load-failed':
			logError('Loading failed')
			logReason(outcome.error)
			return ExitCode.LOAD_FAILED

		case 'save-failed':
			logError('Saving failed')
			logReason(outcome.error)
			return ExitCode.SAVE_FAILED

		case 'converted':
			logDebug(styleKV('Size', `${outcome.image.width}x${outcome.image.height}`))
			logInfo('Successfully converted')
			return ExitCode.OK
	}
}

/**
 * Run the CLI with user arguments (no node/script prefix) and return the exit code
 */
export function run(argv: readonly string[]): number {
	let exitCode: number = ExitCode.OK

	const program = new Command()
		.name('imgconv')
		.description('Convert a raster image between BMP, PPM and JPEG.')
		.version(VERSION, '-V, --version', 'Show version')
		.argument('<in_file>', 'Input image path')
		.argument('<out_file>', 'Output image path')
		.option('-q, --quality <1-100>', `JPEG output quality (default: ${DEFAULT_QUALITY})`, parseQuality)
		.option('-v, --verbose', 'Log conversion details and failure reasons')
		.option('--quiet', 'Do not report success')
		.helpOption('-h, --help', 'Show help')
		.addHelpText('after', FORMATS_HELP)
		.allowExcessArguments(false)
		.exitOverride()
		.action((inFile: string, outFile: string, opts: CliOptions) => {
			exitCode = convertCommand(inFile, outFile, opts)
		})

	try {
		program.parse([...argv], { from: 'user' })
	} catch (err) {
		if (err instanceof CommanderError) {
			// Help and version exit with 0; usage errors with 1
			return err.exitCode === 0 ? ExitCode.OK : ExitCode.USAGE
		}
		throw err
	}

	return exitCode
}
