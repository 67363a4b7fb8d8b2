/**
 * stdout belongs to JSON-RPC. Anything the process logs through the console
 * goes to stderr instead, so a stray `console.log` cannot corrupt a reply.
 */

const toStderr = (...args: unknown[]): void => {
  console.error(...args);
};

export function routeConsoleToStderr(): void {
  console.log = toStderr;
  console.info = toStderr;
  console.debug = toStderr;
}

routeConsoleToStderr();
