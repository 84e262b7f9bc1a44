import { errorMessage } from "./errors";
import { OperatorNotifier } from "./types";

export class ConsoleNotifier implements OperatorNotifier {
  async alert(message: string): Promise<void> {
    console.error(`[Alert] ${message}`);
  }
}

/** Delivers to every notifier; one failing channel does not stop the others. */
export class FanoutNotifier implements OperatorNotifier {
  constructor(private readonly notifiers: OperatorNotifier[]) {}

  add(notifier: OperatorNotifier): void {
    this.notifiers.push(notifier);
  }

  async alert(message: string): Promise<void> {
    const results = await Promise.allSettled(this.notifiers.map((n) => n.alert(message)));
    for (const r of results) {
      if (r.status === "rejected") console.warn(`[Alert] Delivery failed: ${errorMessage(r.reason)}`);
    }
  }
}
