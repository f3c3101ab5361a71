import type { Card, CreatePackRequest, Database, TopicPack } from '../types';
import {
  getCardById,
  getCardsInOrderOfDue,
  getPackById,
  insertPack,
  listPacks as listPackRows,
  updatePackCards,
} from '../db/queries';
import { ConflictError, NotFoundError, ValidationError } from '../errors';
import { generateId } from '../utils/id';
import { optionalText, uniqueStrings } from '../utils/normalize';

export function createPack(db: Database, input: CreatePackRequest, now: Date = new Date()): TopicPack {
  const name = input.name.trim();
  if (!name) {
    throw new ValidationError('Pack name is required', 'name');
  }
  const timestamp = now.toISOString();

  return db.transaction((): TopicPack => {
    const cardIds = uniqueStrings(input.cardIds).filter((id) => getCardById(db, id) !== null);
    const pack: TopicPack = {
      id: generateId(),
      name,
      description: optionalText(input.description),
      topics: uniqueStrings(input.topics),
      targetBand: input.targetBand ?? null,
      cardIds,
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    const result = insertPack(db, pack);
    if (result.status === 'duplicate_name') {
      throw new ConflictError(`A pack named "${name}" already exists`, 'name');
    }
    console.log(`[Packs] Created "${name}" with ${cardIds.length} cards`);
    return result.pack;
  })();
}

export function listPacks(
  db: Database,
  page: number,
  limit: number
): { packs: TopicPack[]; total: number; page: number; limit: number } {
  const { packs, total } = listPackRows(db, page, limit);
  return { packs, total, page, limit };
}

export function getPack(db: Database, id: string): TopicPack {
  const pack = getPackById(db, id);
  if (!pack) throw new NotFoundError('Pack not found');
  return pack;
}

/**
 * Append a card to a pack. Adding a card that is already there is a no-op.
 */
export function addCardToPack(db: Database, packId: string, cardId: string, now: Date = new Date()): TopicPack {
  return db.transaction((): TopicPack => {
    const pack = getPack(db, packId);
    if (!getCardById(db, cardId)) throw new NotFoundError('Card not found');
    if (pack.cardIds.includes(cardId)) return pack;

    const updated: TopicPack = { ...pack, cardIds: [...pack.cardIds, cardId], updatedAt: now.toISOString() };
    updatePackCards(db, pack.id, updated.cardIds, updated.updatedAt);
    return updated;
  })();
}

export function getPackSession(db: Database, packId: string, limit = 20): { pack: TopicPack; cards: Card[] } {
  if (!Number.isInteger(limit) || limit < 1 || limit > 100) {
    throw new ValidationError('limit must be between 1 and 100', 'limit');
  }
  const pack = getPack(db, packId);
  return { pack, cards: getCardsInOrderOfDue(db, pack.cardIds, limit) };
}
