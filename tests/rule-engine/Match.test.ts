import { describe, it, expect, vi } from 'vitest';
import { InvalidDeckError, Match } from '../../src/rule-engine/Match';
import {
  blastDeck,
  createTestMatch,
  createTestRng,
  deckOf,
  eventTypes,
  fillerCards,
  fillerDeck,
  placeCreature,
  playerOf,
  setHealth,
  startedMatch,
  testCreature,
  testSpell,
} from '../helpers/fixtures';

describe('Match', () => {
  describe('construction', () => {
    it('should reject an illegal deck', () => {
      expect(() => createTestMatch({ decks: [deckOf('tiny', fillerCards().slice(0, 3)), fillerDeck()] })).toThrow(
        InvalidDeckError,
      );
      expect(() => createTestMatch({ decks: [deckOf('tiny', fillerCards().slice(0, 3)), fillerDeck()] })).toThrow(
        'Deck "tiny" is invalid: Deck must contain exactly 30 cards (has 6)',
      );
    });

    it('should shuffle both decks into draw piles', () => {
      const match = createTestMatch();
      expect(match.phase).toBe('init');
      expect(match.players.map((p) => p.drawPile.size())).toEqual([30, 30]);
      expect(match.players.map((p) => p.hand.length)).toEqual([0, 0]);
    });

    it('should reject bad rule overrides', () => {
      expect(() => createTestMatch({ rules: { battlefieldLimit: 0 } })).toThrow();
    });
  });

  describe('start', () => {
    it('should deal opening hands and enter the mulligan', () => {
      const match = createTestMatch({ rules: { skipMulligan: false } });
      match.start();

      expect(match.phase).toBe('mulligan');
      expect(match.turnNumber).toBe(0);
      expect(match.players.map((p) => p.hand.length)).toEqual([3, 3]);
      expect(eventTypes(match)).toEqual([
        'game-started',
        'card-drawn',
        'card-drawn',
        'card-drawn',
        'card-drawn',
        'card-drawn',
        'card-drawn',
      ]);
      expect(match.history[0]).toEqual({
        type: 'game-started',
        playerId: 'alice',
        payload: { player1Id: 'alice', player2Id: 'bob' },
        timestamp: 0,
      });
    });

    it('should go straight to the first turn without a mulligan', () => {
      const match = startedMatch();

      expect(match.phase).toBe('main');
      expect(match.turnNumber).toBe(1);
      expect(match.getActivePlayer().id).toBe('alice');
      expect(playerOf(match, 'alice').mana).toBe(1);
      expect(playerOf(match, 'alice').hand).toHaveLength(3);
      expect(match.recentEvents(1)[0].payload).toEqual({
        turnNumber: 1,
        playerId: 'alice',
        mana: 1,
      });
    });

    it('should draw on the first turn when configured to', () => {
      const match = startedMatch({ rules: { skipFirstDraw: false } });
      expect(playerOf(match, 'alice').hand).toHaveLength(4);
    });

    it('should refuse to start twice', () => {
      const match = startedMatch();
      expect(() => match.start()).toThrow('Match has already started (phase "main")');
    });

    it('should deal the same hands for the same rng seed', () => {
      const first = startedMatch({ rng: createTestRng(9) });
      const second = startedMatch({ rng: createTestRng(9) });
      expect(playerOf(first, 'alice').hand).toEqual(playerOf(second, 'alice').hand);
      expect(playerOf(first, 'bob').hand).toEqual(playerOf(second, 'bob').hand);
    });
  });

  describe('mulligan', () => {
    function inMulligan(): Match {
      const match = createTestMatch({ rules: { skipMulligan: false } });
      match.start();
      return match;
    }

    it('should replace the chosen cards and keep the hand size', () => {
      const match = inMulligan();
      const alice = playerOf(match, 'alice');

      expect(match.mulligan('alice', [0, 2]).ok).toBe(true);

      expect(alice.hand).toHaveLength(3);
      expect(alice.drawPile.size()).toBe(27);
      expect(match.hasMulliganed('alice')).toBe(true);
      expect(eventTypes(match).slice(-3)).toEqual(['mulligan', 'card-drawn', 'card-drawn']);
      expect(match.eventsOfType('mulligan')[0].payload).toEqual({ playerId: 'alice', replaced: 2 });
      expect(match.phase).toBe('mulligan');
    });

    it('should start the first turn once both players have chosen', () => {
      const match = inMulligan();
      match.mulligan('alice', []);
      match.mulligan('bob', [1]);

      expect(match.phase).toBe('main');
      expect(match.turnNumber).toBe(1);
      expect(match.getActivePlayer().id).toBe('alice');
    });

    it('should reject repeated or out-of-range positions', () => {
      const match = inMulligan();
      expect(match.mulligan('alice', [0, 0])).toEqual({
        ok: false,
        code: 'invalid-mulligan',
        message: 'Mulligan positions must be distinct hand indexes',
      });
      expect(match.mulligan('alice', [3])).toMatchObject({ code: 'invalid-mulligan' });
      expect(match.hasMulliganed('alice')).toBe(false);
    });

    it('should allow only one mulligan per player', () => {
      const match = inMulligan();
      match.mulligan('alice', []);
      expect(match.mulligan('alice', [0])).toMatchObject({ code: 'already-mulliganed' });
    });

    it('should reject mulligans outside the mulligan phase', () => {
      const match = startedMatch();
      expect(match.mulligan('alice', [])).toMatchObject({ code: 'wrong-phase' });
    });

    it('should reject turn actions during the mulligan', () => {
      const match = inMulligan();
      expect(match.endTurn('alice')).toMatchObject({
        code: 'wrong-phase',
        message: 'Cannot act during the mulligan phase',
      });
    });
  });

  describe('turn flow', () => {
    it('should pass the turn and grow mana', () => {
      const match = startedMatch();

      expect(match.endTurn('alice').ok).toBe(true);

      expect(match.turnNumber).toBe(2);
      expect(match.currentPlayerIndex).toBe(1);
      expect(playerOf(match, 'bob').mana).toBe(1);
      expect(playerOf(match, 'bob').hand).toHaveLength(4);
      expect(eventTypes(match).slice(-3)).toEqual(['turn-ended', 'turn-started', 'card-drawn']);
    });

    it('should advance two turns and restore the seat after two end-turns', () => {
      const match = startedMatch();
      const before = { turn: match.turnNumber, seat: match.currentPlayerIndex };

      match.endTurn('alice');
      match.endTurn('bob');

      expect(match.turnNumber).toBe(before.turn + 2);
      expect(match.currentPlayerIndex).toBe(before.seat);
      expect(playerOf(match, 'alice').maxMana).toBe(2);
      expect(playerOf(match, 'alice').hand).toHaveLength(4);
    });

    it('should reject actions from the waiting player without changes', () => {
      const match = startedMatch();
      const historyLength = match.history.length;

      expect(match.endTurn('bob')).toEqual({
        ok: false,
        code: 'not-your-turn',
        message: "It is not bob's turn",
      });
      expect(match.turnNumber).toBe(1);
      expect(match.history).toHaveLength(historyLength);
    });

    it('should reject unknown players', () => {
      const match = startedMatch();
      expect(match.endTurn('carol')).toMatchObject({ code: 'unknown-player' });
      expect(match.concede('carol')).toMatchObject({ code: 'unknown-player' });
    });

    it('should emit events to subscribers', () => {
      const match = startedMatch();
      const listener = vi.fn();
      match.events.on('turn-started', listener);

      match.endTurn('alice');

      expect(listener).toHaveBeenCalledWith({ turnNumber: 2, playerId: 'bob', mana: 1 });
    });

    it('should notify intent listeners of accepted intents only', () => {
      const match = startedMatch();
      const listener = vi.fn();
      const unsubscribe = match.onIntent(listener);

      match.endTurn('bob');
      match.endTurn('alice');
      unsubscribe();
      match.endTurn('bob');

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith('alice', { type: 'end-turn' });
    });
  });

  describe('drawing', () => {
    it('should draw before readying the board at turn start', () => {
      const match = startedMatch();
      const bob = playerOf(match, 'bob');
      const draw = vi.spyOn(bob, 'drawCard');
      const ready = vi.spyOn(bob, 'startTurn');

      match.endTurn('alice');

      expect(draw).toHaveBeenCalledTimes(1);
      expect(ready).toHaveBeenCalledTimes(1);
      expect(draw.mock.invocationCallOrder[0]).toBeLessThan(ready.mock.invocationCallOrder[0]);
      expect([bob.mana, bob.maxMana, bob.cardsDrawnThisTurn]).toEqual([1, 1, 1]);
    });

    it('should deal fatigue damage from an empty pile at turn start', () => {
      const match = startedMatch();
      const bob = playerOf(match, 'bob');
      bob.drawPile.clear();

      match.endTurn('alice');

      expect(bob.health).toBe(29);
      expect(match.eventsOfType('fatigue-damage').map((e) => e.payload)).toEqual([
        { playerId: 'bob', amount: 1 },
      ]);
      expect(match.phase).toBe('main');
    });

    it('should end the game when fatigue is lethal', () => {
      const match = startedMatch();
      const bob = playerOf(match, 'bob');
      bob.drawPile.clear();
      setHealth(bob, 1);

      expect(match.endTurn('alice').ok).toBe(true);

      expect(match.phase).toBe('game-over');
      expect(match.winnerId).toBe('alice');
      expect(match.recentEvents(1)[0].payload).toEqual({
        winnerId: 'alice',
        loserId: 'bob',
        reason: 'opponent-defeated',
        turnNumber: 2,
      });
    });

    it('should burn a card drawn into a full hand', () => {
      const match = startedMatch();
      const bob = playerOf(match, 'bob');
      for (const card of fillerCards('spare').slice(0, 7)) bob.addToHand(card);
      const pileBefore = bob.drawPile.size();

      match.endTurn('alice');

      expect(bob.hand).toHaveLength(10);
      expect(bob.drawPile.size()).toBe(pileBefore - 1);
      expect(match.eventsOfType('card-burned')).toHaveLength(1);
      expect(match.eventsOfType('card-burned')[0].payload.playerId).toBe('bob');
    });
  });

  describe('playing cards', () => {
    it('should summon a creature and spend mana', () => {
      const match = startedMatch();
      const alice = playerOf(match, 'alice');
      const card = alice.hand[0];

      expect(match.playCard('alice', card.id).ok).toBe(true);

      expect(alice.mana).toBe(0);
      expect(alice.hand).toHaveLength(2);
      expect(alice.battlefield.map((c) => c.instanceId)).toEqual([`${card.id}#1`]);
      expect(alice.cardsPlayedThisTurn).toBe(1);
      expect(match.recentEvents(2).map((e) => e.payload)).toEqual([
        { playerId: 'alice', cardId: card.id, manaSpent: 1 },
        { playerId: 'alice', cardId: card.id, instanceId: `${card.id}#1`, position: 0 },
      ]);
    });

    it('should give summoned creatures summoning sickness', () => {
      const match = startedMatch();
      const card = playerOf(match, 'alice').hand[0];
      match.playCard('alice', card.id);

      expect(match.attack('alice', `${card.id}#1`, { kind: 'face' })).toEqual({
        ok: false,
        code: 'cannot-attack',
        message: `${card.id} cannot attack right now`,
      });
    });

    it('should summon at the requested position', () => {
      const match = startedMatch();
      const alice = playerOf(match, 'alice');
      placeCreature(alice, testCreature('old', 1, 1), 'old@1');
      const card = alice.hand[0];

      match.playCard('alice', card.id, { position: 0 });

      expect(alice.battlefield.map((c) => c.cardId)).toEqual([card.id, 'old']);
    });

    it('should reject cards that are not in hand', () => {
      const match = startedMatch();
      expect(match.playCard('alice', 'ghost')).toEqual({
        ok: false,
        code: 'card-not-in-hand',
        message: 'Card "ghost" is not in hand',
      });
    });

    it('should reject unaffordable cards and change nothing', () => {
      const match = startedMatch();
      const alice = playerOf(match, 'alice');
      alice.addToHand(testCreature('pricey', 5, 5, { cost: 5 }));
      const historyLength = match.history.length;

      expect(match.playCard('alice', 'pricey')).toEqual({
        ok: false,
        code: 'insufficient-mana',
        message: '"pricey" costs 5 but only 1 mana is available',
      });
      expect(alice.hand).toHaveLength(4);
      expect(alice.mana).toBe(1);
      expect(match.history).toHaveLength(historyLength);
    });

    it('should reject creatures when the battlefield is full', () => {
      const match = startedMatch();
      const alice = playerOf(match, 'alice');
      for (let i = 0; i < 7; i++) placeCreature(alice, testCreature(`wall_${i}`, 0, 5), `wall@${i}`);

      expect(match.playCard('alice', alice.hand[0].id)).toMatchObject({ code: 'battlefield-full' });
      expect(alice.hand).toHaveLength(3);
    });

    it('should end the game after three 10-damage hits', () => {
      const match = startedMatch({ decks: [blastDeck('alice-blasts'), blastDeck('bob-blasts')] });
      const alice = playerOf(match, 'alice');
      const bob = playerOf(match, 'bob');

      const [first, second, third] = alice.hand;
      match.playCard('alice', first.id);
      match.playCard('alice', second.id);
      expect(bob.health).toBe(10);
      expect(match.isGameOver).toBe(false);

      match.playCard('alice', third.id);

      expect(bob.health).toBe(0);
      expect(match.phase).toBe('game-over');
      expect(match.winnerId).toBe('alice');
      expect(match.winReason).toBe('opponent-defeated');
      expect(match.winner).toBe(alice);
    });

    it('should start no further turn after a lethal hit', () => {
      const match = startedMatch({ decks: [blastDeck('alice-blasts'), blastDeck('bob-blasts')] });
      for (const card of [...playerOf(match, 'alice').hand]) match.playCard('alice', card.id);

      expect(eventTypes(match).slice(-2)).toEqual(['damage', 'game-ended']);
      expect(match.eventsOfType('turn-started')).toHaveLength(1);
      expect(match.turnNumber).toBe(1);
      expect(match.endTurn('alice')).toMatchObject({ code: 'game-over' });
      expect(match.concede('bob')).toMatchObject({ code: 'game-over' });
    });

    it('should hand the win to the second seat when both heroes fall together', () => {
      const match = startedMatch();
      const alice = playerOf(match, 'alice');
      const bob = playerOf(match, 'bob');
      setHealth(alice, 5);
      setHealth(bob, 5);
      const doom = testSpell('doom', [
        { type: 'damage', value: 5, target: 'enemy-hero' },
        { type: 'damage', value: 5, target: 'friendly-hero' },
      ]);
      alice.addToHand(doom);

      match.playCard('alice', 'doom');

      expect(match.winnerId).toBe('bob');
    });
  });

  describe('concede', () => {
    it('should end the game in favour of the opponent', () => {
      const match = startedMatch();

      expect(match.concede('bob').ok).toBe(true);

      expect(match.isGameOver).toBe(true);
      expect(match.winnerId).toBe('alice');
      expect(match.winReason).toBe('concede');
      expect(match.recentEvents(1)[0]).toMatchObject({
        type: 'game-ended',
        playerId: 'alice',
        payload: { winnerId: 'alice', loserId: 'bob', reason: 'concede', turnNumber: 1 },
      });
    });

    it('should be allowed during the mulligan', () => {
      const match = createTestMatch({ rules: { skipMulligan: false } });
      match.start();

      match.concede('alice');

      expect(match.winnerId).toBe('bob');
    });
  });

  describe('queries', () => {
    it('should find players and opponents', () => {
      const match = startedMatch();
      expect(match.getPlayer('bob')?.name).toBe('Bob');
      expect(match.getPlayer('carol')).toBeUndefined();
      expect(match.getOpponentOf('alice')?.id).toBe('bob');
      expect(match.getOpponentOf('carol')).toBeUndefined();
    });

    it('should return the most recent events', () => {
      const match = startedMatch();
      expect(match.recentEvents(2).map((e) => e.type)).toEqual(['card-drawn', 'turn-started']);
      expect(match.recentEvents(0)).toEqual([]);
    });

    it('should snapshot plain data', () => {
      const match = startedMatch();
      const alice = playerOf(match, 'alice');
      const card = alice.hand[0];
      match.playCard('alice', card.id);

      const snapshot = match.snapshot();

      expect(snapshot.activePlayerId).toBe('alice');
      expect(snapshot.phase).toBe('main');
      expect(snapshot.historyLength).toBe(match.history.length);
      expect(snapshot.players[0].hand).not.toBe(alice.hand);
      expect(snapshot.players[0].hand).toEqual(alice.hand);
      expect(snapshot.players[0].drawPileSize).toBe(27);
      expect(snapshot.players[0].battlefield[0]).toMatchObject({
        instanceId: `${card.id}#1`,
        attack: 1,
        health: 1,
        state: 'summoned',
        canAttack: false,
      });
      expect(snapshot.players[1].weapon).toBeNull();
    });
  });
});
