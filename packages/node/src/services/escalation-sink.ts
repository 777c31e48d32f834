/**
 * Escalation delivery through the service logger.
 *
 * Blocking decisions log at error so they page; everything else at warn.
 */

import type { Logger } from "pino";
import type { EscalationSink } from "@rightsline/escalation";

export function createLoggerSink(logger: Logger): EscalationSink {
  const log = logger.child({ component: "escalation" });
  return {
    deliver(decision) {
      const fields = {
        issueKind: decision.issueKind,
        source: decision.source,
        subject: decision.subject,
        action: decision.action,
        matched: decision.matched,
      };
      if (decision.action === "block") {
        log.error(fields, decision.message);
      } else {
        log.warn(fields, decision.message);
      }
    },
  };
}
