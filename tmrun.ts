/**
 * tmrun: run a binary Turing machine program and print its trace
 *
 * Usage:
 *   npm run build && node dist/tmrun.mjs <program.tm> [tape] [options]
 *
 * Options:
 *   --max-steps N   Stop after N steps (default 1000)
 *   --timeout MS    Stop after MS milliseconds
 *   --ascii         Plain ASCII table
 *   --no-pointer    Do not mark the scanned cell
 *   --unary         Label input/output rows with their unary numbers
 *   --json          Output the trace as JSON
 *   --quiet         Only print the outcome line
 */
import { runTmrun } from './src/cli/tmrun';

process.exit(runTmrun(process.argv.slice(2)));
