const logPrefix = `[prefix-match pid=${process.pid}]`;
export const log = {
  debug: (...args: unknown[]) => {
    if (process.env["PREFIX_MATCH_DEBUG"]) console.warn(logPrefix, ...args);
  },
  info: (...args: unknown[]) => console.warn(logPrefix, ...args),
  warn: (...args: unknown[]) => console.warn(logPrefix, ...args),
  error: (...args: unknown[]) => console.error(logPrefix, ...args),
};

export const errorMessage = (error: unknown) => {
  if (typeof error == "string") {
    return error;
  } else if (error instanceof Error) {
    return error.message;
  } else {
    return String(error);
  }
};
