// Quote one argument so a logged command line can be pasted into a POSIX shell.
export function quoteShellArg(arg: string): string {
  if (arg === "") return "''";
  if (/["'\s;|&$`\\()<>*?[\]{}!#~]/.test(arg)) {
    return `'${arg.replace(/'/g, "'\\''")}'`;
  }

  return arg;
}

export function formatCommandLine(argv: readonly string[]): string {
  return argv.map(quoteShellArg).join(" ");
}
