import { WriteError } from "../errors";

export type EncodeOptions = {
  /** Always mark the last argument as the trailing parameter. */
  trailing?: boolean;
};

const invalid = (message: string) => new WriteError("InvalidArgument", message);

/**
 * Encodes a command and its arguments into one protocol line, without the
 * terminating CRLF. The last argument becomes the trailing parameter when it
 * has to be one (empty, contains a space, starts with a colon) or when asked to.
 */
export const encode = (command: string, args: readonly string[] = [], options: EncodeOptions = {}): string => {
  if (!/^[A-Za-z0-9]+$/.test(command)) throw invalid(`Invalid command "${command}".`);

  const parts = [command];
  args.forEach((arg, index) => {
    if (/[\r\n\0]/.test(arg)) throw invalid(`Argument ${index} of ${command} contains a line break.`);

    const last = index === args.length - 1;
    const needsColon = arg === "" || arg.includes(" ") || arg.startsWith(":");
    if (!last) {
      if (needsColon) throw invalid(`Argument ${index} of ${command} must be a single non-empty word.`);
      parts.push(arg);
      return;
    }
    parts.push(needsColon || options.trailing ? `:${arg}` : arg);
  });

  return parts.join(" ");
};
