/**
 * INotifier: human-facing alert contract
 *
 * Delivery is best-effort: implementations report what happened and never
 * throw. A failed alert is logged, never escalated further.
 */

export type AlertDelivery =
  | { status: 'delivered' }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: Error };

export interface INotifier {
  readonly id: string;
  notify(message: string): Promise<AlertDelivery>;
}
