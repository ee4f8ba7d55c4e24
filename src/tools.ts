import { MAX_NAME_LENGTH, type ParamTable } from './schemas.js';

// ============================================
// TOOL CATALOG
// ============================================

export const TOOL_NAMES = [
  'list_boards',
  'get_board',
  'create_board',
  'update_board',
  'get_lists',
  'create_list',
  'get_cards',
  'create_card',
  'update_card',
  'add_member_to_card',
  'search_cards',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export interface ToolAnnotations {
  title: string;
  readOnlyHint: boolean;
  destructiveHint: boolean;
  idempotentHint: boolean;
  openWorldHint: boolean;
}

export interface ToolDescriptor {
  name: ToolName;
  description: string;
  parameters: ParamTable;
  /** At least one of these parameters must be present. */
  requireOneOf?: readonly string[];
  annotations: ToolAnnotations;
}

const readOnly = (title: string): ToolAnnotations => ({
  title,
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: true,
});

const mutating = (title: string, idempotent: boolean): ToolAnnotations => ({
  title,
  readOnlyHint: false,
  destructiveHint: false,
  idempotentHint: idempotent,
  openWorldHint: true,
});

const PERMISSION_VALUES = ['disabled', 'members', 'observers', 'org', 'public'] as const;

const BOARD_PREFS: ParamTable = {
  permissionLevel: { kind: 'enum', values: ['private', 'org', 'public'], description: 'Who can see the board' },
  voting: { kind: 'enum', values: PERMISSION_VALUES, description: 'Who can vote on cards' },
  comments: { kind: 'enum', values: PERMISSION_VALUES, description: 'Who can comment on cards' },
  background: { kind: 'string', minLength: 1, description: 'Board background (color name or image id)' },
};

const name = (what: string) => ({
  kind: 'string' as const,
  minLength: 1,
  maxLength: MAX_NAME_LENGTH,
  description: `Name of the ${what}`,
});

const id = (what: string, required = true) => ({
  kind: 'string' as const,
  minLength: 1,
  required,
  description: `ID of the ${what}`,
});

export const TOOL_CATALOG: readonly ToolDescriptor[] = [
  {
    name: 'list_boards',
    description: `List all open boards the authenticated user belongs to.

RETURNS: id, name, description, URL and closed flag for every board.
Use the board ids with get_board, get_lists or search_cards.`,
    parameters: {},
    annotations: readOnly('List boards'),
  },
  {
    name: 'get_board',
    description: `Get a board with its open lists, open cards and members.

PARAMETERS:
- board_id (required): Board ID from list_boards

RETURNS: board details, every open list, every open card and the member list.

ERRORS:
- NOT_FOUND: the board does not exist or you cannot see it`,
    parameters: {
      board_id: id('board to retrieve'),
    },
    annotations: readOnly('Get board'),
  },
  {
    name: 'create_board',
    description: `Create a new board.

PARAMETERS:
- name (required): 1-16384 characters
- desc (optional): board description
- organization_id (optional): workspace to create the board in
- default_lists (optional): create the To Do / Doing / Done lists (default: true)
- prefs (optional): permissionLevel, voting, comments, background

Omitted fields take Trello's defaults.`,
    parameters: {
      name: { ...name('board'), required: true },
      desc: { kind: 'string', maxLength: MAX_NAME_LENGTH, description: 'Description of the board' },
      organization_id: id('workspace (organization)', false),
      default_lists: { kind: 'boolean', default: true, description: 'Create the default lists' },
      prefs: { kind: 'object', properties: BOARD_PREFS, description: 'Board preferences' },
    },
    annotations: mutating('Create board', false),
  },
  {
    name: 'update_board',
    description: `Update an existing board. Only the fields you pass are changed.

PARAMETERS:
- board_id (required)
- name, desc, closed (archive/unarchive), prefs (optional)`,
    parameters: {
      board_id: id('board to update'),
      name: name('board'),
      desc: { kind: 'string', maxLength: MAX_NAME_LENGTH, description: 'New description of the board' },
      closed: { kind: 'boolean', description: 'Close (archive) or reopen the board' },
      prefs: { kind: 'object', properties: BOARD_PREFS, description: 'Board preferences to update' },
    },
    annotations: mutating('Update board', true),
  },
  {
    name: 'get_lists',
    description: 'Get all open lists on a board, in board order.',
    parameters: {
      board_id: id('board'),
    },
    annotations: readOnly('Get lists'),
  },
  {
    name: 'create_list',
    description: `Create a new list on a board.

PARAMETERS:
- name (required), board_id (required)
- pos (optional): "top", "bottom" or a positive number`,
    parameters: {
      name: { ...name('list'), required: true },
      board_id: id('board'),
      pos: { kind: 'position', description: 'Position of the list' },
    },
    annotations: mutating('Create list', false),
  },
  {
    name: 'get_cards',
    description: `Get open cards from a list or a whole board.

PARAMETERS (one of them is required):
- list_id: cards of this list (takes precedence)
- board_id: cards of every list on the board`,
    parameters: {
      board_id: id('board', false),
      list_id: id('list', false),
    },
    requireOneOf: ['board_id', 'list_id'],
    annotations: readOnly('Get cards'),
  },
  {
    name: 'create_card',
    description: `Create a new card in a list.

PARAMETERS:
- name (required): 1-16384 characters
- list_id (required): target list, from get_lists
- desc (optional): markdown description
- pos (optional): "top", "bottom" or a positive number
- due (optional): ISO-8601 date, e.g. 2024-01-01T12:00:00Z
- labels (optional): label IDs
- members (optional): member IDs

Omitted fields take Trello's defaults.`,
    parameters: {
      name: { ...name('card'), required: true },
      list_id: id('list'),
      desc: { kind: 'string', maxLength: MAX_NAME_LENGTH, description: 'Description of the card' },
      pos: { kind: 'position', description: 'Position of the card' },
      due: { kind: 'date', description: 'Due date (ISO-8601)' },
      labels: { kind: 'string[]', description: 'Label IDs' },
      members: { kind: 'string[]', description: 'Member IDs' },
    },
    annotations: mutating('Create card', false),
  },
  {
    name: 'update_card',
    description: `Update an existing card. Omitted fields are left unchanged.

PARAMETERS:
- card_id (required)
- name, desc, closed, list_id (move), pos (optional)
- due (optional): ISO-8601 date, or null to remove the due date`,
    parameters: {
      card_id: id('card to update'),
      name: name('card'),
      desc: { kind: 'string', maxLength: MAX_NAME_LENGTH, description: 'New description of the card' },
      closed: { kind: 'boolean', description: 'Archive or unarchive the card' },
      list_id: id('list to move the card to', false),
      pos: { kind: 'position', description: 'New position of the card' },
      due: { kind: 'date', nullable: true, description: 'Due date (ISO-8601), null to remove' },
    },
    annotations: mutating('Update card', true),
  },
  {
    name: 'add_member_to_card',
    description: 'Add a member to a card.',
    parameters: {
      card_id: id('card'),
      member_id: id('member to add'),
    },
    annotations: mutating('Add member to card', true),
  },
  {
    name: 'search_cards',
    description: `Search cards by text across boards.

PARAMETERS:
- query (required): Trello search query
- board_ids (optional): restrict the search to these boards (single request)
- limit (optional): 1-1000, default 50

Without board_ids every accessible board is searched separately. If some
boards fail, matches from the others are still returned and the result is
marked incomplete (complete: false, incomplete_board_ids).`,
    parameters: {
      query: { kind: 'string', minLength: 1, required: true, description: 'Search query' },
      board_ids: { kind: 'string[]', description: 'Board IDs to search in' },
      limit: { kind: 'integer', min: 1, max: 1000, default: 50, description: 'Maximum number of results' },
    },
    annotations: readOnly('Search cards'),
  },
];

// Accepted by every tool and removed before dispatch
export const COMMON_PARAMETERS: ParamTable = {
  api_key: { kind: 'string', description: 'Trello API key (optional, falls back to the session credentials)' },
  token: { kind: 'string', description: 'Trello API token (optional, used together with api_key)' },
  format: { kind: 'enum', values: ['markdown', 'json'], description: 'Text output format (default: markdown)' },
};
