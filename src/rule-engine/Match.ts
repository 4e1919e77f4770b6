/**
 * The authoritative state machine of a SpireSmiths match.
 *
 * A Match owns two PlayerStates and the phase cycle
 * `init -> mulligan -> start-turn -> main -> end-turn -> start-turn ...`
 * ending in `game-over`. Drivers submit intents; each intent is validated
 * in full before anything changes, so a rejection leaves the match exactly
 * as it was. Every state change is appended to the event history and
 * emitted through `events`.
 */

import type { Card, CreatureCard } from '../card-system/Card';
import { abilitiesFor } from '../card-system/Card';
import { buildDrawPile, validateDeck, type DeckDefinition } from '../card-system/Deck';
import {
  GameEventEmitter,
  isEventOfType,
  type EntityRef,
  type GameEventMap,
  type GameEventName,
  type GameEventRecord,
  type WinReason,
} from '../core-engine/GameEventEmitter';
import { createGameState, type GamePhase, type GameState } from '../core-engine/GameState';
import { createLogger, type Logger } from '../core-engine/Logger';
import type { Rng } from '../core-engine/Rng';
import { createRulesConfig, type RulesConfig } from '../core-engine/RulesConfig';
import {
  beginTurn,
  endGame,
  getCurrentPlayerState,
  isGameOver,
  otherIndex,
  passTurn,
  transitionTo,
} from '../core-engine/TurnSequencer';
import { CreatureInstance } from './CreatureInstance';
import {
  resolveAbility,
  spellDamageBonus,
  toEntityRef,
  type EffectContext,
  type EffectHost,
  type ResolvedTarget,
} from './Effects';
import {
  ACCEPTED,
  isLegalAttackTarget,
  legalAttackTargets,
  reject,
  type AttackIntent,
  type Intent,
  type IntentResult,
  type PlayCardIntent,
} from './Intents';
import { snapshotPlayer, type MatchSnapshot } from './MatchSnapshot';
import { PlayerState, type DrawResult } from './PlayerState';

// ── Errors ──────────────────────────────────────────────────

/** Thrown when a Match is constructed from a deck that breaks the rules. */
export class InvalidDeckError extends Error {
  readonly deckId: string;
  readonly errors: readonly string[];

  constructor(deckId: string, errors: readonly string[]) {
    super(`Deck "${deckId}" is invalid: ${errors.join('; ')}`);
    this.name = 'InvalidDeckError';
    this.deckId = deckId;
    this.errors = errors;
  }
}

// ── Options ─────────────────────────────────────────────────

export interface MatchPlayerSetup {
  readonly id: string;
  readonly name: string;
  readonly isAI?: boolean;
  readonly deck: DeckDefinition;
}

export interface MatchOptions {
  /** Seat 0 takes the first turn. */
  players: readonly [MatchPlayerSetup, MatchPlayerSetup];
  /** Shuffles draw piles and mulligans (defaults to Math.random). */
  rng?: Rng;
  rules?: Partial<RulesConfig>;
  logger?: Logger;
  /** Timestamp source for history entries (defaults to Date.now). */
  clock?: () => number;
}

/** Called after every accepted intent. */
export type IntentListener = (playerId: string, intent: Intent) => void;

// ── Match ───────────────────────────────────────────────────

export class Match {
  readonly events = new GameEventEmitter();
  readonly rules: RulesConfig;

  private readonly state: GameState<PlayerState>;
  private readonly rng: Rng;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly eventHistory: GameEventRecord[] = [];
  private readonly mulliganDone = new Set<string>();
  private readonly intentListeners: IntentListener[] = [];
  private nextInstanceNumber = 1;
  private winnerIdValue: string | null = null;
  private winReasonValue: WinReason | null = null;

  /** Effect operations routed back into this match. */
  private readonly host: EffectHost = {
    dealDamage: (target, amount, sourceId) => this.dealDamage(target, amount, sourceId),
    heal: (target, amount, sourceId) => this.healTarget(target, amount, sourceId),
    drawCards: (player, count) => {
      for (let i = 0; i < count; i++) this.drawFor(player);
    },
    resolveRef: (ref) => this.resolveRef(ref),
  };

  /**
   * @throws InvalidDeckError if either deck fails `validateDeck`.
   * @throws ZodError if a rules override is invalid.
   */
  constructor(options: MatchOptions) {
    const { players, rng = Math.random, clock = Date.now } = options;
    this.rules = createRulesConfig(options.rules);
    this.rng = rng;
    this.clock = clock;
    this.logger = options.logger?.child('Match') ?? createLogger({ tag: 'Match' });

    for (const setup of players) {
      const validation = validateDeck(setup.deck);
      if (!validation.isValid) {
        throw new InvalidDeckError(setup.deck.id, validation.errors);
      }
    }

    this.state = createGameState<PlayerState>({
      players: players.map((p) => ({ id: p.id, name: p.name, isAI: p.isAI ?? false })),
      createPlayerState: (index) => {
        const setup = players[index];
        return new PlayerState({
          id: setup.id,
          name: setup.name,
          isAI: setup.isAI ?? false,
          rules: this.rules,
          drawPile: buildDrawPile(setup.deck, this.rng).toArray(),
        });
      },
    });
  }

  // ── Queries ───────────────────────────────────────────────

  get phase(): GamePhase {
    return this.state.phase;
  }

  get turnNumber(): number {
    return this.state.turnNumber;
  }

  get currentPlayerIndex(): number {
    return this.state.currentPlayerIndex;
  }

  get players(): readonly PlayerState[] {
    return this.state.playerStates;
  }

  get isGameOver(): boolean {
    return isGameOver(this.state);
  }

  get winnerId(): string | null {
    return this.winnerIdValue;
  }

  get winReason(): WinReason | null {
    return this.winReasonValue;
  }

  get winner(): PlayerState | undefined {
    return this.winnerIdValue === null ? undefined : this.getPlayer(this.winnerIdValue);
  }

  /** The append-only event history, oldest first. */
  get history(): readonly GameEventRecord[] {
    return this.eventHistory;
  }

  getActivePlayer(): PlayerState {
    return getCurrentPlayerState(this.state);
  }

  getPlayer(playerId: string): PlayerState | undefined {
    return this.state.playerStates.find((p) => p.id === playerId);
  }

  getOpponentOf(playerId: string): PlayerState | undefined {
    const index = this.seatOf(playerId);
    return index === -1 ? undefined : this.state.playerStates[otherIndex(index)];
  }

  hasMulliganed(playerId: string): boolean {
    return this.mulliganDone.has(playerId);
  }

  /** The last `count` history entries. */
  recentEvents(count: number): GameEventRecord[] {
    return count <= 0 ? [] : this.eventHistory.slice(-count);
  }

  eventsOfType<K extends GameEventName>(type: K): GameEventRecord<K>[] {
    const matching: GameEventRecord<K>[] = [];
    for (const record of this.eventHistory) {
      if (isEventOfType(record, type)) matching.push(record);
    }
    return matching;
  }

  snapshot(): MatchSnapshot {
    const [first, second] = this.state.playerStates;
    return {
      turnNumber: this.state.turnNumber,
      phase: this.state.phase,
      currentPlayerIndex: this.state.currentPlayerIndex,
      activePlayerId: this.getActivePlayer().id,
      players: [snapshotPlayer(first), snapshotPlayer(second)],
      winnerId: this.winnerIdValue,
      winReason: this.winReasonValue,
      historyLength: this.eventHistory.length,
      rules: this.rules,
    };
  }

  /** Subscribe to accepted intents. Returns an unsubscribe function. */
  onIntent(listener: IntentListener): () => void {
    this.intentListeners.push(listener);
    return () => {
      const index = this.intentListeners.indexOf(listener);
      if (index !== -1) this.intentListeners.splice(index, 1);
    };
  }

  // ── Lifecycle ─────────────────────────────────────────────

  /**
   * Deal opening hands and enter the mulligan (or the first turn when
   * mulligans are disabled).
   *
   * @throws If the match has already started.
   */
  start(): void {
    if (this.state.phase !== 'init') {
      throw new Error(`Match has already started (phase "${this.state.phase}")`);
    }

    const [first, second] = this.state.playerStates;
    this.record('game-started', first.id, {
      player1Id: first.id,
      player2Id: second.id,
    });

    for (const player of this.state.playerStates) {
      for (let i = 0; i < this.rules.initialHandSize; i++) {
        this.drawFor(player);
      }
    }

    if (this.rules.skipMulligan) {
      this.enterStartTurn();
    } else {
      transitionTo(this.state, 'mulligan');
    }
  }

  // ── Intents ───────────────────────────────────────────────

  /** Validate and apply an intent on behalf of a player. */
  submit(playerId: string, intent: Intent): IntentResult {
    const result = this.dispatch(playerId, intent);
    if (result.ok) {
      for (const listener of [...this.intentListeners]) {
        listener(playerId, intent);
      }
    } else {
      this.logger.debug(`Rejected ${intent.type} from ${playerId}: ${result.message}`);
    }
    return result;
  }

  playCard(
    playerId: string,
    cardId: string,
    options: { target?: EntityRef; position?: number } = {},
  ): IntentResult {
    return this.submit(playerId, { type: 'play-card', cardId, ...options });
  }

  attack(playerId: string, attackerId: string, target: AttackIntent['target']): IntentResult {
    return this.submit(playerId, { type: 'attack', attackerId, target });
  }

  endTurn(playerId: string): IntentResult {
    return this.submit(playerId, { type: 'end-turn' });
  }

  concede(playerId: string): IntentResult {
    return this.submit(playerId, { type: 'concede' });
  }

  mulligan(playerId: string, replace: readonly number[]): IntentResult {
    return this.submit(playerId, { type: 'mulligan', replace });
  }

  private dispatch(playerId: string, intent: Intent): IntentResult {
    switch (intent.type) {
      case 'play-card': {
        const rejection = this.rejectUnlessActive(playerId);
        return rejection ?? this.handlePlayCard(this.getActivePlayer(), intent);
      }
      case 'attack': {
        const rejection = this.rejectUnlessActive(playerId);
        return rejection ?? this.handleAttack(this.getActivePlayer(), intent);
      }
      case 'end-turn': {
        const rejection = this.rejectUnlessActive(playerId);
        return rejection ?? this.handleEndTurn(this.getActivePlayer());
      }
      case 'concede':
        return this.handleConcede(playerId);
      case 'mulligan':
        return this.handleMulligan(playerId, intent.replace);
    }
  }

  private rejectUnlessActive(playerId: string): IntentResult | undefined {
    if (this.isGameOver) {
      return reject('game-over', 'The match is over');
    }
    const player = this.getPlayer(playerId);
    if (player === undefined) {
      return reject('unknown-player', `Unknown player "${playerId}"`);
    }
    if (this.state.phase !== 'main') {
      return reject('wrong-phase', `Cannot act during the ${this.state.phase} phase`);
    }
    if (this.getActivePlayer() !== player) {
      return reject('not-your-turn', `It is not ${playerId}'s turn`);
    }
    return undefined;
  }

  private handlePlayCard(player: PlayerState, intent: PlayCardIntent): IntentResult {
    const card = player.findInHand(intent.cardId);
    if (card === undefined) {
      return reject('card-not-in-hand', `Card "${intent.cardId}" is not in hand`);
    }
    if (card.cost > player.mana) {
      return reject(
        'insufficient-mana',
        `"${card.id}" costs ${card.cost} but only ${player.mana} mana is available`,
      );
    }
    if (card.type === 'creature' && player.isBattlefieldFull) {
      return reject('battlefield-full', 'The battlefield is full');
    }
    if (intent.target !== undefined) {
      const target = this.resolveRef(intent.target);
      if (target === undefined) {
        return reject('invalid-target', 'The chosen target does not exist');
      }
      if (
        target.kind === 'creature' &&
        target.owner !== player &&
        target.creature.hasKeyword('stealth')
      ) {
        return reject('invalid-target', 'Stealthed creatures cannot be targeted');
      }
    }

    player.removeFromHand(card.id);
    player.spendMana(card.cost);
    player.recordCardPlayed();
    this.record('card-played', player.id, {
      playerId: player.id,
      cardId: card.id,
      manaSpent: card.cost,
      ...(intent.target !== undefined ? { target: intent.target } : {}),
    });
    this.logger.debug(`${player.id} played ${card.id}`);

    switch (card.type) {
      case 'creature':
        this.summon(player, card, intent);
        break;
      case 'spell':
        this.cast(player, card, intent);
        break;
      case 'weapon':
        player.equipWeapon(card);
        this.record('weapon-equipped', player.id, { playerId: player.id, cardId: card.id });
        break;
    }

    this.afterDamage();
    return ACCEPTED;
  }

  private summon(player: PlayerState, card: CreatureCard, intent: PlayCardIntent): void {
    const creature = new CreatureInstance(card, this.newInstanceId(card), player.id);
    player.addToBattlefield(creature, intent.position);
    this.record('creature-summoned', player.id, {
      playerId: player.id,
      cardId: card.id,
      instanceId: creature.instanceId,
      position: player.battlefield.indexOf(creature),
    });

    for (const ability of abilitiesFor(creature.abilities, 'battlecry')) {
      resolveAbility(
        ability,
        this.contextFor(player, creature.instanceId, creature, intent.target),
        this.host,
      );
    }
  }

  private cast(player: PlayerState, card: Card, intent: PlayCardIntent): void {
    const ctx: EffectContext = {
      ...this.contextFor(player, card.id, undefined, intent.target),
      damageBonus: spellDamageBonus(player),
    };
    for (const ability of abilitiesFor(card.abilities, 'cast')) {
      resolveAbility(ability, ctx, this.host);
    }
  }

  private handleAttack(player: PlayerState, intent: AttackIntent): IntentResult {
    const attacker = player.getCreature(intent.attackerId);
    if (attacker === undefined) {
      return reject('unknown-attacker', `No creature "${intent.attackerId}" on your battlefield`);
    }
    if (!attacker.canAttack()) {
      return reject('cannot-attack', `${attacker.name} cannot attack right now`);
    }

    const opponent = this.opponentOf(player);
    const defenders = opponent.battlefield.filter((c) => c.isAlive);
    const legal = legalAttackTargets(
      defenders.map((c) => ({
        instanceId: c.instanceId,
        taunt: c.hasKeyword('taunt'),
        stealth: c.hasKeyword('stealth'),
      })),
    );

    let defender: CreatureInstance | undefined;
    if (intent.target.kind === 'creature') {
      defender = opponent.getCreature(intent.target.instanceId);
      if (defender === undefined) {
        return reject('invalid-target', `No enemy creature "${intent.target.instanceId}"`);
      }
    }
    if (!isLegalAttackTarget(intent.target, legal)) {
      return reject(
        'invalid-target',
        legal.faceAllowed
          ? 'That creature cannot be targeted'
          : 'A creature with Taunt must be attacked first',
      );
    }

    attacker.declareAttack();
    player.recordAttack();
    const targetRef: EntityRef =
      defender === undefined
        ? { kind: 'hero', playerId: opponent.id }
        : { kind: 'creature', instanceId: defender.instanceId };
    this.record('attack', player.id, {
      playerId: player.id,
      attackerId: attacker.instanceId,
      target: targetRef,
    });

    if (defender === undefined) {
      this.combatHit(attacker, player, { kind: 'hero', player: opponent }, attacker.attack);
    } else {
      const attackerDamage = attacker.attack;
      const defenderDamage = defender.attack;
      this.combatHit(
        attacker,
        player,
        { kind: 'creature', creature: defender, owner: opponent },
        attackerDamage,
      );
      this.combatHit(
        defender,
        opponent,
        { kind: 'creature', creature: attacker, owner: player },
        defenderDamage,
      );
    }

    this.afterDamage();
    return ACCEPTED;
  }

  /** One side of combat: damage plus Poisonous and Lifesteal. */
  private combatHit(
    source: CreatureInstance,
    sourceOwner: PlayerState,
    target: ResolvedTarget,
    amount: number,
  ): void {
    const applied = this.dealDamage(target, amount, source.instanceId);
    source.recordDamageDealt(applied);
    if (applied <= 0) return;

    if (target.kind === 'creature' && source.hasKeyword('poisonous')) {
      target.creature.destroy();
    }
    if (source.hasKeyword('lifesteal')) {
      this.healTarget({ kind: 'hero', player: sourceOwner }, applied, source.instanceId);
    }
  }

  private handleEndTurn(player: PlayerState): IntentResult {
    this.record('turn-ended', player.id, {
      turnNumber: this.state.turnNumber,
      playerId: player.id,
    });
    transitionTo(this.state, 'end-turn');
    this.runEndOfTurn(player);
    if (this.afterDamage()) return ACCEPTED;

    passTurn(this.state);
    this.enterStartTurn();
    return ACCEPTED;
  }

  private runEndOfTurn(player: PlayerState): void {
    player.endTurn();
    for (const creature of [...player.battlefield]) {
      if (!creature.isAlive) continue;
      for (const ability of abilitiesFor(creature.abilities, 'end-of-turn')) {
        resolveAbility(
          ability,
          this.contextFor(player, creature.instanceId, creature),
          this.host,
        );
      }
    }
  }

  private handleConcede(playerId: string): IntentResult {
    if (this.isGameOver) {
      return reject('game-over', 'The match is over');
    }
    const seat = this.seatOf(playerId);
    if (seat === -1) {
      return reject('unknown-player', `Unknown player "${playerId}"`);
    }
    this.finish(otherIndex(seat), 'concede');
    return ACCEPTED;
  }

  private handleMulligan(playerId: string, replace: readonly number[]): IntentResult {
    if (this.isGameOver) {
      return reject('game-over', 'The match is over');
    }
    const player = this.getPlayer(playerId);
    if (player === undefined) {
      return reject('unknown-player', `Unknown player "${playerId}"`);
    }
    if (this.state.phase !== 'mulligan') {
      return reject('wrong-phase', `Cannot mulligan during the ${this.state.phase} phase`);
    }
    if (this.mulliganDone.has(playerId)) {
      return reject('already-mulliganed', `${playerId} has already mulliganed`);
    }
    const returned = player.takeFromHand(replace);
    if (returned.length !== replace.length) {
      return reject('invalid-mulligan', 'Mulligan positions must be distinct hand indexes');
    }
    player.returnToDrawPile(returned, this.rng);
    this.mulliganDone.add(playerId);
    this.record('mulligan', playerId, { playerId, replaced: returned.length });
    for (let i = 0; i < returned.length; i++) {
      this.drawFor(player);
    }

    if (this.mulliganDone.size === this.state.players.length) {
      this.enterStartTurn();
    }
    return ACCEPTED;
  }

  // ── Turn flow ─────────────────────────────────────────────

  private enterStartTurn(): void {
    beginTurn(this.state);
    const player = this.getActivePlayer();
    player.prepareTurn();
    this.record('turn-started', player.id, {
      turnNumber: this.state.turnNumber,
      playerId: player.id,
      mana: player.mana,
    });

    if (!(this.state.turnNumber === 1 && this.rules.skipFirstDraw)) {
      this.drawFor(player);
    }
    player.startTurn();

    if (this.afterDamage()) return;
    transitionTo(this.state, 'main');
  }

  /**
   * Remove dead creatures, resolve their deathrattles, then check whether
   * a hero has fallen.
   *
   * @returns true when the match is over.
   */
  private afterDamage(): boolean {
    this.removeDeadCreatures();
    return this.checkWinConditions();
  }

  private removeDeadCreatures(): void {
    for (;;) {
      const fallen: Array<{ creature: CreatureInstance; owner: PlayerState }> = [];
      for (const owner of this.state.playerStates) {
        for (const creature of owner.battlefield) {
          if (!creature.isAlive) fallen.push({ creature, owner });
        }
      }
      if (fallen.length === 0) return;

      for (const { creature, owner } of fallen) {
        owner.removeFromBattlefield(creature.instanceId);
        this.record('creature-destroyed', owner.id, {
          playerId: owner.id,
          instanceId: creature.instanceId,
          cardId: creature.cardId,
        });
      }
      for (const { creature, owner } of fallen) {
        for (const ability of abilitiesFor(creature.abilities, 'deathrattle')) {
          resolveAbility(
            ability,
            this.contextFor(owner, creature.instanceId, creature),
            this.host,
          );
        }
      }
    }
  }

  /** Players are checked in seat order; the first dead one loses. */
  private checkWinConditions(): boolean {
    if (this.isGameOver) return true;
    const seat = this.state.playerStates.findIndex((p) => p.isDead);
    if (seat === -1) return false;
    this.finish(otherIndex(seat), 'opponent-defeated');
    return true;
  }

  private finish(winnerIndex: number, reason: WinReason): void {
    endGame(this.state);
    const winner = this.state.playerStates[winnerIndex];
    const loser = this.state.playerStates[otherIndex(winnerIndex)];
    this.winnerIdValue = winner.id;
    this.winReasonValue = reason;
    this.record('game-ended', winner.id, {
      winnerId: winner.id,
      loserId: loser.id,
      reason,
      turnNumber: this.state.turnNumber,
    });
    this.logger.info(`${winner.name} wins (${reason}) on turn ${this.state.turnNumber}`);
  }

  // ── Effect host ───────────────────────────────────────────

  private dealDamage(target: ResolvedTarget, amount: number, sourceId: string): number {
    if (amount <= 0) return 0;

    if (target.kind === 'hero') {
      const applied = target.player.takeDamage(amount);
      this.record('damage', target.player.id, {
        target: toEntityRef(target),
        amount: applied,
        sourceId,
        absorbed: false,
      });
      return applied;
    }

    const absorbed = target.creature.hasKeyword('divine-shield');
    const applied = target.creature.takeDamage(amount);
    this.record('damage', target.owner.id, {
      target: toEntityRef(target),
      amount: applied,
      sourceId,
      absorbed,
    });
    return applied;
  }

  private healTarget(target: ResolvedTarget, amount: number, sourceId: string): number {
    const applied =
      target.kind === 'hero' ? target.player.heal(amount) : target.creature.heal(amount);
    if (applied > 0) {
      this.record('heal', target.kind === 'hero' ? target.player.id : target.owner.id, {
        target: toEntityRef(target),
        amount: applied,
        sourceId,
      });
    }
    return applied;
  }

  private drawFor(player: PlayerState): DrawResult {
    const result = player.drawCard();
    switch (result.kind) {
      case 'drawn':
        this.record('card-drawn', player.id, { playerId: player.id, cardId: result.card.id });
        break;
      case 'burned':
        this.record('card-burned', player.id, { playerId: player.id, cardId: result.card.id });
        break;
      case 'fatigue':
        this.record('fatigue-damage', player.id, { playerId: player.id, amount: result.damage });
        break;
    }
    return result;
  }

  private resolveRef(ref: EntityRef): ResolvedTarget | undefined {
    if (ref.kind === 'hero') {
      const player = this.getPlayer(ref.playerId);
      return player === undefined ? undefined : { kind: 'hero', player };
    }
    for (const owner of this.state.playerStates) {
      const creature = owner.getCreature(ref.instanceId);
      if (creature !== undefined) return { kind: 'creature', creature, owner };
    }
    return undefined;
  }

  // ── Helpers ───────────────────────────────────────────────

  private contextFor(
    controller: PlayerState,
    sourceId: string,
    sourceCreature?: CreatureInstance,
    chosenTarget?: EntityRef,
  ): EffectContext {
    return {
      controller,
      opponent: this.opponentOf(controller),
      sourceId,
      sourceCreature,
      chosenTarget,
      damageBonus: 0,
    };
  }

  private opponentOf(player: PlayerState): PlayerState {
    return this.state.playerStates[otherIndex(this.state.playerStates.indexOf(player))];
  }

  private seatOf(playerId: string): number {
    return this.state.playerStates.findIndex((p) => p.id === playerId);
  }

  private newInstanceId(card: CreatureCard): string {
    return `${card.id}#${this.nextInstanceNumber++}`;
  }

  private record<K extends GameEventName>(
    type: K,
    playerId: string,
    payload: GameEventMap[K],
  ): void {
    const entry: GameEventRecord<K> = { type, playerId, payload, timestamp: this.clock() };
    this.eventHistory.push(entry);
    this.events.emit(type, payload);
  }
}
