export type LiveEventType =
    | 'run.started'
    | 'run.progress'
    | 'run.paused'
    | 'run.resumed'
    | 'run.stalled'
    | 'run.completed'
    | 'run.stopped'
    | 'run.failed'
    | 'run.log';

export interface LiveEventMessage {
    /** Progressivo del processo: è l'`id:` SSE usato da `Last-Event-ID`. */
    id: number;
    type: LiveEventType;
    runId: string | null;
    payload: Record<string, unknown>;
    timestamp: string;
}

export interface LiveEventFilter {
    runId?: string | null;
    types?: readonly LiveEventType[];
}

type LiveEventListener = (event: LiveEventMessage) => void;

const REPLAY_BUFFER_SIZE = 200;

const listeners = new Map<LiveEventListener, LiveEventFilter>();
const replayBuffer: LiveEventMessage[] = [];
let lastEventId = 0;

function matchesFilter(event: LiveEventMessage, filter: LiveEventFilter): boolean {
    if (filter.runId && event.runId !== filter.runId) return false;
    if (filter.types && !filter.types.includes(event.type)) return false;
    return true;
}

export function publishLiveEvent(type: LiveEventType, payload: Record<string, unknown> = {}): LiveEventMessage {
    lastEventId += 1;
    const event: LiveEventMessage = {
        id: lastEventId,
        type,
        runId: typeof payload.runId === 'string' ? payload.runId : null,
        payload,
        timestamp: new Date().toISOString(),
    };

    replayBuffer.push(event);
    if (replayBuffer.length > REPLAY_BUFFER_SIZE) {
        replayBuffer.shift();
    }

    for (const [listener, filter] of listeners) {
        if (!matchesFilter(event, filter)) continue;
        try {
            listener(event);
        } catch (error) {
            // Un listener rotto (es. client SSE chiuso) non deve bloccare gli altri.
            console.error('[WARN] live_events.listener_failed', error instanceof Error ? error.message : String(error));
        }
    }
    return event;
}

export function subscribeLiveEvents(listener: LiveEventListener, filter: LiveEventFilter = {}): () => void {
    listeners.set(listener, filter);
    return () => {
        listeners.delete(listener);
    };
}

/** Eventi ancora in memoria successivi a `afterId`, per riallineare un client SSE che si riconnette. */
export function getLiveEventsSince(afterId: number, filter: LiveEventFilter = {}): LiveEventMessage[] {
    return replayBuffer.filter((event) => event.id > afterId && matchesFilter(event, filter));
}

export function getLiveEventSubscribersCount(): number {
    return listeners.size;
}
