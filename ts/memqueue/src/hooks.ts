/**
 * Optional callbacks for counting queue activity.
 *
 * Each hook runs synchronously after the store writes it reports on. A hook
 * that throws rejects the surrounding call, but the put or delivery it
 * reported stays recorded.
 */
export interface QueueHooks {
  /** Called after a message is stored and registered */
  onPut?: (queue: string, messageKey: string) => void
  /** Called after a read that advanced the client's cursor; found=false means the payload was gone */
  onDeliver?: (queue: string, clientID: string, messageKey: string, found: boolean) => void
  /** Called when a lagging client is skipped straight to the newest message */
  onFastForward?: (queue: string, clientID: string, lagMs: number) => void
  /** Called when a writer lost the race to create the current bucket */
  onBucketRace?: (queue: string, bucketKey: string) => void
}
