import debugLib from "debug";

/**
 * Shared project debug logger.
 *
 * All components log under the "qgs" namespace; the component is shown as
 * a prefix in the message.
 *
 * Usage:
 *   import { projectDebug } from "@/lib/project/debug";
 *   const dbg = projectDebug("extract");
 *   dbg("matched %d layers", 3);  // outputs: qgs [extract] matched 3 layers +2ms
 *
 * Enable with DEBUG=qgs
 */

const projectLogger = debugLib("qgs");

export function projectDebug(
  component: string
): (formatter: string, ...args: unknown[]) => void {
  const prefix = `[${component}]`;
  return (formatter: string, ...args: unknown[]) => {
    projectLogger(`${prefix} ${formatter}`, ...args);
  };
}
