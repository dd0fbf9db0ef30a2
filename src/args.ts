// Flags that take the following argument as their value when not written as --flag=value
const VALUE_FLAGS = new Set(['--file', '--driver', '--timeout']);

type ParsedArgs = {
	positional: string[];
	flags: Map<string, string | true>;
};

export function parseArgs(argv: string[]): ParsedArgs {
	const positional: string[] = [];
	const flags = new Map<string, string | true>();
	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i] ?? '';
		if (arg.startsWith('--')) {
			const eq = arg.indexOf('=');
			const next = argv[i + 1];
			if (eq !== -1) {
				flags.set(arg.slice(0, eq), arg.slice(eq + 1));
			} else if (VALUE_FLAGS.has(arg) && next !== undefined) {
				flags.set(arg, next);
				i++;
			} else {
				flags.set(arg, true);
			}
		} else if (arg.startsWith('-')) {
			flags.set(arg, true);
		} else {
			positional.push(arg);
		}
	}

	return {positional, flags};
}
