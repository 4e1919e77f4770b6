/**
 * Typed event emitter for SpireSmiths matches.
 *
 * A type-safe, zero-dependency emitter for match events. The Match appends
 * every event to its history and then emits it here, so drivers, loggers
 * and transcript recorders can follow a game without polling.
 */

// ── Shared references ───────────────────────────────────────

/** Something that can be damaged, healed or targeted. */
export type EntityRef =
  | { readonly kind: 'hero'; readonly playerId: string }
  | { readonly kind: 'creature'; readonly instanceId: string };

export type WinReason = 'opponent-defeated' | 'concede';

// ── Event Payloads ──────────────────────────────────────────

/** Seat 0 (who takes the first turn) and seat 1. */
export interface GameStartedPayload {
  readonly player1Id: string;
  readonly player2Id: string;
}

export interface CardDrawnPayload {
  readonly playerId: string;
  readonly cardId: string;
}

/** A card drawn into a full hand is destroyed instead. */
export interface CardBurnedPayload {
  readonly playerId: string;
  readonly cardId: string;
}

export interface FatigueDamagePayload {
  readonly playerId: string;
  /** Damage taken; equals the new fatigue counter. */
  readonly amount: number;
}

export interface MulliganPayload {
  readonly playerId: string;
  /** Number of cards sent back and redrawn. */
  readonly replaced: number;
}

export interface TurnStartedPayload {
  readonly turnNumber: number;
  readonly playerId: string;
  readonly mana: number;
}

export interface TurnEndedPayload {
  readonly turnNumber: number;
  readonly playerId: string;
}

export interface CardPlayedPayload {
  readonly playerId: string;
  readonly cardId: string;
  readonly manaSpent: number;
  readonly target?: EntityRef;
}

export interface CreatureSummonedPayload {
  readonly playerId: string;
  readonly cardId: string;
  readonly instanceId: string;
  readonly position: number;
}

export interface WeaponEquippedPayload {
  readonly playerId: string;
  readonly cardId: string;
}

export interface AttackPayload {
  readonly playerId: string;
  readonly attackerId: string;
  readonly target: EntityRef;
}

export interface DamagePayload {
  readonly target: EntityRef;
  /** Damage actually applied after shields and clamping. */
  readonly amount: number;
  /** Card id or creature instance id that dealt the damage. */
  readonly sourceId: string;
  /** Whether a Divine Shield took the hit. */
  readonly absorbed: boolean;
}

export interface HealPayload {
  readonly target: EntityRef;
  readonly amount: number;
  readonly sourceId: string;
}

export interface CreatureDestroyedPayload {
  readonly playerId: string;
  readonly instanceId: string;
  readonly cardId: string;
}

export interface GameEndedPayload {
  readonly winnerId: string;
  readonly loserId: string;
  readonly reason: WinReason;
  readonly turnNumber: number;
}

// ── Event Map ───────────────────────────────────────────────

/**
 * Maps event names to their payload types.
 *
 * Subscribing to an event name not in this map produces a
 * compile-time TypeScript error.
 */
export interface GameEventMap {
  'game-started': GameStartedPayload;
  'card-drawn': CardDrawnPayload;
  'card-burned': CardBurnedPayload;
  'fatigue-damage': FatigueDamagePayload;
  mulligan: MulliganPayload;
  'turn-started': TurnStartedPayload;
  'turn-ended': TurnEndedPayload;
  'card-played': CardPlayedPayload;
  'creature-summoned': CreatureSummonedPayload;
  'weapon-equipped': WeaponEquippedPayload;
  attack: AttackPayload;
  damage: DamagePayload;
  heal: HealPayload;
  'creature-destroyed': CreatureDestroyedPayload;
  'game-ended': GameEndedPayload;
}

/** Union of all valid game event names. */
export type GameEventName = keyof GameEventMap;

/** One entry of a match's append-only history. */
export interface GameEventRecord<K extends GameEventName = GameEventName> {
  readonly type: K;
  /** Player the event belongs to (the acting player for most events). */
  readonly playerId: string;
  readonly payload: GameEventMap[K];
  readonly timestamp: number;
}

/** Narrow a history entry to one event type. */
export function isEventOfType<K extends GameEventName>(
  record: GameEventRecord,
  type: K,
): record is GameEventRecord<K> {
  return record.type === type;
}

// ── Listener types ──────────────────────────────────────────

/** A callback for a specific event type. */
export type GameEventListener<K extends GameEventName> = (
  payload: GameEventMap[K],
) => void;

type ListenerTable = {
  [K in GameEventName]: Array<GameEventListener<K>>;
};

function createListenerTable(): ListenerTable {
  return {
    'game-started': [],
    'card-drawn': [],
    'card-burned': [],
    'fatigue-damage': [],
    mulligan: [],
    'turn-started': [],
    'turn-ended': [],
    'card-played': [],
    'creature-summoned': [],
    'weapon-equipped': [],
    attack: [],
    damage: [],
    heal: [],
    'creature-destroyed': [],
    'game-ended': [],
  };
}

// ── Emitter ─────────────────────────────────────────────────

/**
 * A minimal, typed event emitter for match events.
 *
 * Usage:
 * ```ts
 * const emitter = new GameEventEmitter();
 * emitter.on('damage', (payload) => {
 *   console.log(`${payload.sourceId} dealt ${payload.amount}`);
 * });
 * ```
 */
export class GameEventEmitter {
  private listeners: ListenerTable = createListenerTable();

  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    list.push(listener);

    return () => this.off(event, listener);
  }

  /**
   * Subscribe to an event for a single emission only.
   * Returns an unsubscribe function (in case you want to
   * cancel before it fires).
   */
  once<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    const wrapper: GameEventListener<K> = (payload) => {
      this.off(event, wrapper);
      listener(payload);
    };

    return this.on(event, wrapper);
  }

  /** Remove a specific listener for an event. */
  off<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * Emit an event with the given payload.
   * Listeners are called synchronously in registration order.
   */
  emit<K extends GameEventName>(event: K, payload: GameEventMap[K]): void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    if (list.length === 0) return;

    // Copy the array so listeners can safely unsubscribe during emission
    const snapshot = [...list];
    for (const fn of snapshot) {
      fn(payload);
    }
  }

  /** Remove all listeners, optionally for a specific event only. */
  removeAllListeners<K extends GameEventName>(event?: K): void {
    if (event === undefined) {
      this.listeners = createListenerTable();
      return;
    }
    const list: Array<GameEventListener<K>> = this.listeners[event];
    list.length = 0;
  }

  /** Return the number of listeners for a given event. */
  listenerCount(event: GameEventName): number {
    return this.listeners[event].length;
  }
}
