import type { BoardCache } from './cache.js';
import type { CredentialPair } from './credentials/index.js';
import { ErrorKind, ToolError } from './errors.js';
import { logger } from './logging/index.js';
import type { ToolName } from './tools.js';
import {
  type TrelloApi,
  TrelloApiError,
  type TrelloBoard,
  type TrelloCard,
  TrelloErrorType,
  type TrelloList,
  type TrelloMember,
  type TrelloParams,
} from './trello-client.js';

// ============================================
// OPERATION CONTRACT
// ============================================

export interface OperationContext {
  api: TrelloApi;
  boards: BoardCache;
  auth: CredentialPair;
  signal?: AbortSignal;
}

export interface OperationOutput {
  title: string;
  data: Record<string, unknown>;
}

export type Operation = (args: ToolArgs, ctx: OperationContext) => Promise<OperationOutput>;

/** Typed read access to arguments that already passed registry validation. */
export class ToolArgs {
  constructor(private readonly values: Record<string, unknown>) {}

  has(name: string): boolean {
    return this.values[name] !== undefined;
  }

  string(name: string): string {
    const value = this.optionalString(name);
    if (value === undefined) {
      throw new ToolError(ErrorKind.INVALID_ARGUMENTS, `Missing required field: ${name}`, {
        missingFields: [name],
        typeErrors: [],
      });
    }
    return value;
  }

  optionalString(name: string): string | undefined {
    const value = this.values[name];
    return typeof value === 'string' ? value : undefined;
  }

  boolean(name: string): boolean | undefined {
    const value = this.values[name];
    return typeof value === 'boolean' ? value : undefined;
  }

  number(name: string): number | undefined {
    const value = this.values[name];
    return typeof value === 'number' ? value : undefined;
  }

  stringArray(name: string): string[] | undefined {
    const value = this.values[name];
    if (!Array.isArray(value)) return undefined;
    return value.filter((item): item is string => typeof item === 'string');
  }

  /** "top", "bottom" or a number. */
  position(name: string): string | number | undefined {
    const value = this.values[name];
    return typeof value === 'string' || typeof value === 'number' ? value : undefined;
  }

  object(name: string): ToolArgs | undefined {
    const value = this.values[name];
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;
    return new ToolArgs(Object.fromEntries(Object.entries(value)));
  }

  isNull(name: string): boolean {
    return this.values[name] === null;
  }
}

// ============================================
// RESULT SHAPING
// ============================================

function shapeBoard(board: TrelloBoard) {
  return {
    id: board.id,
    name: board.name,
    desc: board.desc || undefined,
    url: board.url,
    closed: board.closed ?? false,
  };
}

function shapeList(list: TrelloList) {
  return {
    id: list.id,
    name: list.name,
    pos: list.pos,
    closed: list.closed ?? false,
  };
}

function shapeCard(card: TrelloCard) {
  const labels = (card.labels ?? []).map((label) => label.name || label.color || label.id);
  return {
    id: card.id,
    name: card.name,
    desc: card.desc || undefined,
    url: card.url,
    due: card.due ?? undefined,
    closed: card.closed ?? false,
    list_id: card.idList,
    labels: labels.length > 0 ? labels : undefined,
    member_ids: card.idMembers && card.idMembers.length > 0 ? card.idMembers : undefined,
  };
}

function shapeMember(member: TrelloMember) {
  return {
    id: member.id,
    name: member.fullName || member.username || 'Unknown',
    username: member.username,
  };
}

// ============================================
// OUTBOUND PARAMETER MAPPING
// ============================================

/** Copies only the fields that were supplied; omitted fields are never sent. */
function compact(fields: Record<string, string | number | boolean | undefined>): TrelloParams {
  const params: TrelloParams = {};
  for (const [name, value] of Object.entries(fields)) {
    if (value !== undefined) {
      params[name] = value;
    }
  }
  return params;
}

const PREF_NAMES = ['permissionLevel', 'voting', 'comments', 'background'] as const;

// Trello spells board prefs differently on create and update
function prefParams(prefs: ToolArgs | undefined, prefix: 'prefs_' | 'prefs/'): TrelloParams {
  if (!prefs) return {};
  const fields: Record<string, string | undefined> = {};
  for (const name of PREF_NAMES) {
    fields[`${prefix}${name}`] = prefs.optionalString(name);
  }
  return compact(fields);
}

// ============================================
// OPERATIONS
// ============================================

async function fetchOpenBoards(ctx: OperationContext): Promise<TrelloBoard[]> {
  const boards = (await ctx.api.listBoards(ctx.auth, ctx.signal)).filter((board) => !board.closed);
  ctx.boards.set(ctx.auth, boards);
  return boards;
}

async function openBoards(ctx: OperationContext): Promise<TrelloBoard[]> {
  return ctx.boards.get(ctx.auth) ?? fetchOpenBoards(ctx);
}

const listBoards: Operation = async (_args, ctx) => {
  const boards = await fetchOpenBoards(ctx);
  return {
    title: `Boards (${boards.length})`,
    data: { count: boards.length, boards: boards.map(shapeBoard) },
  };
};

const getBoard: Operation = async (args, ctx) => {
  const board = await ctx.api.getBoard(ctx.auth, args.string('board_id'), ctx.signal);
  const lists = board.lists ?? [];
  const cards = board.cards ?? [];
  const members = board.members ?? [];

  return {
    title: `Board: ${board.name}`,
    data: {
      board: { ...shapeBoard(board), prefs: board.prefs ? prefsSummary(board.prefs) : undefined },
      lists: lists.map(shapeList),
      cards: cards.map(shapeCard),
      members: members.map(shapeMember),
    },
  };
};

function prefsSummary(prefs: Record<string, unknown>): Record<string, unknown> {
  const summary: Record<string, unknown> = {};
  for (const name of PREF_NAMES) {
    if (prefs[name] !== undefined) summary[name] = prefs[name];
  }
  return summary;
}

const createBoard: Operation = async (args, ctx) => {
  const params: TrelloParams = {
    ...compact({
      name: args.string('name'),
      desc: args.optionalString('desc'),
      idOrganization: args.optionalString('organization_id'),
      defaultLists: args.boolean('default_lists'),
    }),
    ...prefParams(args.object('prefs'), 'prefs_'),
  };

  const board = await ctx.api.createBoard(ctx.auth, params, ctx.signal);
  ctx.boards.invalidate(ctx.auth);

  return { title: `Board created: ${board.name}`, data: { board: shapeBoard(board) } };
};

const updateBoard: Operation = async (args, ctx) => {
  const params: TrelloParams = {
    ...compact({
      name: args.optionalString('name'),
      desc: args.optionalString('desc'),
      closed: args.boolean('closed'),
    }),
    ...prefParams(args.object('prefs'), 'prefs/'),
  };

  const board = await ctx.api.updateBoard(ctx.auth, args.string('board_id'), params, ctx.signal);
  ctx.boards.invalidate(ctx.auth);

  return {
    title: `Board updated: ${board.name}`,
    data: { board: shapeBoard(board), updated_fields: Object.keys(params) },
  };
};

const getLists: Operation = async (args, ctx) => {
  const boardId = args.string('board_id');
  const lists = await ctx.api.getLists(ctx.auth, boardId, ctx.signal);
  return {
    title: `Lists (${lists.length})`,
    data: { board_id: boardId, count: lists.length, lists: lists.map(shapeList) },
  };
};

const createList: Operation = async (args, ctx) => {
  const params = compact({
    name: args.string('name'),
    idBoard: args.string('board_id'),
    pos: args.position('pos'),
  });

  const list = await ctx.api.createList(ctx.auth, params, ctx.signal);
  return { title: `List created: ${list.name}`, data: { list: shapeList(list) } };
};

const getCards: Operation = async (args, ctx) => {
  const listId = args.optionalString('list_id');
  const cards = listId !== undefined
    ? await ctx.api.getListCards(ctx.auth, listId, ctx.signal)
    : await ctx.api.getBoardCards(ctx.auth, args.string('board_id'), ctx.signal);

  const source = listId !== undefined ? { list_id: listId } : { board_id: args.string('board_id') };
  return {
    title: `Cards (${cards.length})`,
    data: { ...source, count: cards.length, cards: cards.map(shapeCard) },
  };
};

const createCard: Operation = async (args, ctx) => {
  const labels = args.stringArray('labels');
  const members = args.stringArray('members');

  const params = compact({
    name: args.string('name'),
    idList: args.string('list_id'),
    desc: args.optionalString('desc'),
    pos: args.position('pos'),
    due: args.optionalString('due'),
    idLabels: labels && labels.length > 0 ? labels.join(',') : undefined,
    idMembers: members && members.length > 0 ? members.join(',') : undefined,
  });

  const card = await ctx.api.createCard(ctx.auth, params, ctx.signal);
  return { title: `Card created: ${card.name}`, data: { card: shapeCard(card) } };
};

const updateCard: Operation = async (args, ctx) => {
  const params = compact({
    name: args.optionalString('name'),
    desc: args.optionalString('desc'),
    closed: args.boolean('closed'),
    idList: args.optionalString('list_id'),
    pos: args.position('pos'),
    // An explicit null clears the due date
    due: args.isNull('due') ? 'null' : args.optionalString('due'),
  });

  const card = await ctx.api.updateCard(ctx.auth, args.string('card_id'), params, ctx.signal);
  return {
    title: `Card updated: ${card.name}`,
    data: { card: shapeCard(card), updated_fields: Object.keys(params) },
  };
};

const addMemberToCard: Operation = async (args, ctx) => {
  const cardId = args.string('card_id');
  const memberId = args.string('member_id');
  const members = await ctx.api.addMemberToCard(ctx.auth, cardId, memberId, ctx.signal);

  return {
    title: 'Member added to card',
    data: { card_id: cardId, member_id: memberId, members: members.map(shapeMember) },
  };
};

// ============================================
// SEARCH FAN-OUT
// ============================================

const searchCards: Operation = async (args, ctx) => {
  const query = args.string('query');
  const limit = args.number('limit') ?? 50;
  const boardIds = args.stringArray('board_ids');

  if (boardIds && boardIds.length > 0) {
    const cards = await ctx.api.searchCards(
      ctx.auth,
      { query, idBoards: boardIds.join(','), cards_limit: limit },
      ctx.signal
    );
    const matched = cards.slice(0, limit);
    return {
      title: `Search results for "${query}" (${matched.length})`,
      data: { query, count: matched.length, complete: true, cards: matched.map(shapeCard) },
    };
  }

  const boards = await openBoards(ctx);
  const settled = await Promise.allSettled(
    boards.map((board) =>
      ctx.api.searchCards(ctx.auth, { query, idBoards: board.id, cards_limit: limit }, ctx.signal)
    )
  );

  const cards: TrelloCard[] = [];
  const failed: Array<{ boardId: string; reason: unknown }> = [];
  settled.forEach((outcome, index) => {
    if (outcome.status === 'fulfilled') {
      cards.push(...outcome.value);
    } else {
      failed.push({ boardId: boards[index].id, reason: outcome.reason });
    }
  });

  const unauthorized = failed.find(
    ({ reason }) => reason instanceof TrelloApiError && reason.type === TrelloErrorType.AUTH_ERROR
  );
  if (unauthorized) {
    throw unauthorized.reason;
  }
  if (failed.length > 0 && failed.length === boards.length) {
    throw failed[0].reason;
  }

  const matched = cards.slice(0, limit);
  const data: Record<string, unknown> = {
    query,
    count: matched.length,
    complete: failed.length === 0,
    cards: matched.map(shapeCard),
  };

  if (failed.length > 0) {
    const incomplete = failed.map(({ boardId }) => boardId);
    data.incomplete_board_ids = incomplete;
    data.summary = `Searched ${boards.length - failed.length} of ${boards.length} boards; ` +
      `${failed.length} could not be searched: ${incomplete.join(', ')}`;
    logger.warning('Partial search result', {
      boards_total: boards.length,
      boards_failed: failed.length,
    }, 'operations');
  }

  return { title: `Search results for "${query}" (${matched.length})`, data };
};

export const OPERATIONS: Readonly<Record<ToolName, Operation>> = {
  list_boards: listBoards,
  get_board: getBoard,
  create_board: createBoard,
  update_board: updateBoard,
  get_lists: getLists,
  create_list: createList,
  get_cards: getCards,
  create_card: createCard,
  update_card: updateCard,
  add_member_to_card: addMemberToCard,
  search_cards: searchCards,
};
