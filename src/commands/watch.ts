import { ChatInputCommandInteraction, EmbedBuilder } from 'discord.js';
import { SnapshotBoard } from '../core/board.js';
import { CoordinatorStatus } from '../core/coordinator.js';
import { NotFoundError, ValidationError, WatchError } from '../core/errors.js';
import { CoordinatorRegistry } from '../core/registry.js';
import { LISTING_TYPES, SearchDefinitionChanges, SearchDefinitionInput } from '../core/search-definition.js';
import { DATA_CATEGORIES, ListingTypeFilter, SearchDefinition, describeScope } from '../core/types.js';
import { UsageReport } from '../providers/api-usage.js';
import { EbayClient } from '../providers/ebay.js';
import { formatPrice } from '../discord/notifier.js';

const MAX_MESSAGE_LENGTH = 2000;
const MAX_FIELD_LENGTH = 1024;
const RECENT_EVENT_COUNT = 5;

export const REFRESH_TARGETS = ['all', ...DATA_CATEGORIES, 'searches'] as const;
export type RefreshTarget = (typeof REFRESH_TARGETS)[number];

export const CLEARABLE_FIELDS = ['category', 'min_price', 'max_price'] as const;

const HEALTH_LABELS: Record<CoordinatorStatus['health'], string> = {
  ok: '✅',
  failing: '⚠️',
  rejected: '⛔'
};

const USAGE_LABELS: Record<UsageReport['level'], string> = {
  low: 'niedrig',
  moderate: 'mittel',
  high: 'hoch'
};

/** The subset of `interaction.options` the parsers read. */
export type OptionReader = {
  getString(name: string): string | null;
  getNumber(name: string): number | null;
  getInteger(name: string): number | null;
  getBoolean(name: string): boolean | null;
};

export type WatchContext = {
  registry: CoordinatorRegistry;
  board: SnapshotBoard;
  clients: ReadonlyMap<string, EbayClient>;
};

const isListingType = (value: string): value is ListingTypeFilter =>
  LISTING_TYPES.some((listingType) => listingType === value);

const isRefreshTarget = (value: string): value is RefreshTarget =>
  REFRESH_TARGETS.some((target) => target === value);

const readListingType = (options: OptionReader): ListingTypeFilter | undefined => {
  const value = options.getString('listing_type');
  if (value === null) {
    return undefined;
  }
  if (!isListingType(value)) {
    throw new ValidationError([`listing_type: unbekannter Wert ${value}`]);
  }
  return value;
};

const orUndefined = <T>(value: T | null): T | undefined => (value === null ? undefined : value);

export const resolveAccount = (accounts: string[], requested: string | null): string => {
  if (requested) {
    if (!accounts.includes(requested)) {
      throw new NotFoundError(`Unbekanntes Konto: ${requested}`);
    }
    return requested;
  }
  if (accounts.length === 1) {
    return accounts[0];
  }
  throw new ValidationError([`Bitte ein Konto angeben (${accounts.join(', ') || 'keine Konten konfiguriert'})`]);
};

export const parseRefreshTarget = (value: string | null): RefreshTarget => {
  if (value === null) {
    return 'all';
  }
  if (!isRefreshTarget(value)) {
    throw new ValidationError([`target: unbekannter Wert ${value}`]);
  }
  return value;
};

export const parseSearchInput = (options: OptionReader): SearchDefinitionInput => ({
  searchQuery: options.getString('query') ?? '',
  site: orUndefined(options.getString('site')),
  categoryId: orUndefined(options.getString('category')),
  minPrice: orUndefined(options.getNumber('min_price')),
  maxPrice: orUndefined(options.getNumber('max_price')),
  listingType: readListingType(options),
  updateInterval: orUndefined(options.getInteger('interval'))
});

export const parseClearFields = (value: string | null): Set<(typeof CLEARABLE_FIELDS)[number]> => {
  const fields = new Set<(typeof CLEARABLE_FIELDS)[number]>();
  if (!value) {
    return fields;
  }
  for (const part of value.split(',')) {
    const name = part.trim();
    if (!name) {
      continue;
    }
    const field = CLEARABLE_FIELDS.find((candidate) => candidate === name);
    if (!field) {
      throw new ValidationError([`clear: unbekanntes Feld ${name}`]);
    }
    fields.add(field);
  }
  return fields;
};

export const parseSearchChanges = (options: OptionReader): SearchDefinitionChanges => {
  const clear = parseClearFields(options.getString('clear'));
  const changes: SearchDefinitionChanges = {
    searchQuery: orUndefined(options.getString('query')),
    site: orUndefined(options.getString('site')),
    categoryId: clear.has('category') ? null : orUndefined(options.getString('category')),
    minPrice: clear.has('min_price') ? null : orUndefined(options.getNumber('min_price')),
    maxPrice: clear.has('max_price') ? null : orUndefined(options.getNumber('max_price')),
    listingType: readListingType(options),
    updateInterval: orUndefined(options.getInteger('interval'))
  };
  return changes;
};

export const runRefresh = (registry: CoordinatorRegistry, account: string | undefined, target: RefreshTarget): string => {
  const accounts = account === undefined ? registry.accounts() : [account];
  if (target === 'all') {
    if (account === undefined) {
      registry.refreshAll();
    } else {
      registry.refreshAccount(account);
    }
  } else {
    for (const name of accounts) {
      if (target === 'searches') {
        registry.refreshSearches(name);
      } else {
        registry.refreshCategory(name, target);
      }
    }
  }
  return `🔄 Aktualisierung angestoßen (${target}) für ${accounts.join(', ') || 'keine Konten'}.`;
};

const formatPriceRange = (search: SearchDefinition): string | undefined => {
  if (search.minPrice === undefined && search.maxPrice === undefined) {
    return undefined;
  }
  const min = search.minPrice !== undefined ? search.minPrice.toFixed(2) : '0.00';
  const max = search.maxPrice !== undefined ? search.maxPrice.toFixed(2) : '∞';
  return `${min} – ${max}`;
};

export const formatSearch = (search: SearchDefinition): string => {
  const parts = [`**${search.searchQuery}**`, search.site, search.listingType, `alle ${search.updateInterval} Min.`];
  const range = formatPriceRange(search);
  if (range) {
    parts.push(`Preis ${range}`);
  }
  if (search.categoryId) {
    parts.push(`Kategorie ${search.categoryId}`);
  }
  return `• \`${search.searchId}\` ${parts.join(' · ')}`;
};

export const formatStatusLine = (status: CoordinatorStatus): string => {
  const last = status.lastSuccessAt ? status.lastSuccessAt.toISOString() : 'nie';
  const base = `${HEALTH_LABELS[status.health]} ${status.account}/${describeScope(status.scope)}: ${status.itemCount} Einträge, letzter Abruf ${last}`;
  if (status.consecutiveFailures > 0) {
    return `${base}, ${status.consecutiveFailures} Fehlversuche (${status.lastError?.message ?? 'unbekannt'})`;
  }
  return base;
};

export const formatUsage = (report: UsageReport): string => {
  const lines = report.apis.map(
    (api) =>
      `• ${api.apiName}: ${api.callsMade} Aufrufe in ${api.hoursElapsed} h (${api.callsPerHour}/h, ~${api.estimatedDaily}/Tag)`
  );
  return [
    `**API-Nutzung ${report.account}** seit ${report.trackingStart.toISOString()}`,
    ...lines,
    `Gesamt: ${report.totalCalls} Aufrufe, ~${report.estimatedDailyTotal}/Tag, Auslastung ${USAGE_LABELS[report.level]}`
  ].join('\n');
};

const limitLength = (content: string, max = MAX_MESSAGE_LENGTH): string =>
  content.length > max ? `${content.slice(0, max - 1)}…` : content;

const buildBoardEmbed = (context: WatchContext, account: string): EmbedBuilder => {
  const embed = new EmbedBuilder().setTitle(`Überblick ${account}`).setColor(0x5865f2).setTimestamp(new Date());
  for (const view of context.board.viewsOf(account)) {
    const cheapest = view.items
      .filter((item) => item.currentPrice !== undefined)
      .sort((a, b) => (a.currentPrice?.value ?? 0) - (b.currentPrice?.value ?? 0))[0];
    const details = [`${view.itemCount} Einträge`];
    if (cheapest) {
      details.push(`ab ${formatPrice(cheapest.currentPrice)}`);
    }
    if (view.health !== 'ok') {
      details.push(`${HEALTH_LABELS[view.health]} ${view.lastError ?? ''}`.trim());
    }
    embed.addFields({ name: describeScope(view.scope), value: details.join(' · '), inline: true });
  }
  const recent = context.board.recentEvents(RECENT_EVENT_COUNT, account);
  if (recent.length > 0) {
    embed.addFields({
      name: 'Letzte Ereignisse',
      value: limitLength(recent.map((event) => `${event.type}: ${event.item.title}`).join('\n'), MAX_FIELD_LENGTH)
    });
  }
  return embed;
};

const runSubcommand = async (
  subcommand: string,
  interaction: ChatInputCommandInteraction,
  context: WatchContext
): Promise<{ content?: string; embeds?: EmbedBuilder[] }> => {
  const { registry } = context;
  const requested = interaction.options.getString('account');

  switch (subcommand) {
    case 'refresh': {
      const searchId = interaction.options.getString('search_id');
      if (searchId) {
        const account = resolveAccount(registry.accounts(), requested);
        registry.refreshSearch(account, searchId);
        return { content: `🔄 Aktualisierung angestoßen (Suche \`${searchId}\`) für ${account}.` };
      }
      const account = requested ? resolveAccount(registry.accounts(), requested) : undefined;
      return { content: runRefresh(registry, account, parseRefreshTarget(interaction.options.getString('target'))) };
    }
    case 'search-create': {
      const account = resolveAccount(registry.accounts(), requested);
      const definition = await registry.addSearch(account, parseSearchInput(interaction.options));
      return { content: `✅ Suche angelegt:\n${formatSearch(definition)}` };
    }
    case 'search-update': {
      const account = resolveAccount(registry.accounts(), requested);
      const searchId = interaction.options.getString('search_id', true);
      const updated = await registry.updateSearch(account, searchId, parseSearchChanges(interaction.options));
      return { content: `✅ Suche aktualisiert:\n${formatSearch(updated)}` };
    }
    case 'search-delete': {
      const account = resolveAccount(registry.accounts(), requested);
      const searchId = interaction.options.getString('search_id', true);
      await registry.deleteSearch(account, searchId);
      return { content: `🗑️ Suche \`${searchId}\` gelöscht.` };
    }
    case 'search-list': {
      const account = resolveAccount(registry.accounts(), requested);
      const searches = registry.listSearches(account);
      if (searches.length === 0) {
        return { content: `Keine gespeicherten Suchen für ${account}.` };
      }
      return { content: [`**Suchen ${account}**`, ...searches.map(formatSearch)].join('\n') };
    }
    case 'status': {
      const account = requested ? resolveAccount(registry.accounts(), requested) : undefined;
      const lines = registry.listStatus(account).map(formatStatusLine);
      const embeds = (account === undefined ? registry.accounts() : [account]).map((name) =>
        buildBoardEmbed(context, name)
      );
      return { content: lines.join('\n') || 'Keine Konten konfiguriert.', embeds: embeds.slice(0, 10) };
    }
    case 'usage': {
      const account = resolveAccount(registry.accounts(), requested);
      const client = context.clients.get(account);
      if (!client) {
        throw new NotFoundError(`Kein Client für Konto ${account}`);
      }
      const content = formatUsage(client.usage.report());
      if (interaction.options.getBoolean('reset')) {
        client.usage.reset();
        return { content: `${content}\n\nZähler zurückgesetzt.` };
      }
      return { content };
    }
    default:
      throw new ValidationError([`Unbekannter Unterbefehl: ${subcommand}`]);
  }
};

export const handleWatchCommand = async (
  interaction: ChatInputCommandInteraction,
  context: WatchContext
): Promise<void> => {
  await interaction.deferReply();
  const subcommand = interaction.options.getSubcommand();

  try {
    const reply = await runSubcommand(subcommand, interaction, context);
    await interaction.editReply({ ...reply, content: reply.content ? limitLength(reply.content) : undefined });
  } catch (error) {
    if (error instanceof WatchError) {
      await interaction.editReply({ content: `⚠️ ${error.message}` });
      return;
    }
    await interaction.editReply({ content: 'Beim Ausführen des Befehls ist ein Fehler aufgetreten.' });
    throw error;
  }
};
