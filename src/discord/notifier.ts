import { EmbedBuilder } from 'discord.js';
import { snapshotKey } from '../core/snapshot-store.js';
import {
  CoordinatorScope,
  ItemRecord,
  Money,
  Publisher,
  ShippingStatus,
  SnapshotView,
  WatchEvent,
  WatchEventType,
  describeScope
} from '../core/types.js';
import { logger } from '../util/logger.js';

export type NotifierMessage = {
  content?: string;
  embeds?: EmbedBuilder[];
};

export type MessageSink = (message: NotifierMessage) => Promise<unknown>;

const MAX_TITLE_LENGTH = 256;

const EVENT_LABELS: Record<WatchEventType, string> = {
  new_item: '🆕 Neuer Treffer',
  became_high_bidder: '🟢 Höchstbietender',
  outbid: '🔴 Überboten',
  auction_ending_soon: '⏰ Endet bald',
  auction_won: '🏆 Gewonnen',
  auction_lost: '❌ Verloren',
  item_shipped: '📦 Versendet',
  item_delivered: '✅ Zugestellt'
};

const EVENT_COLORS: Record<WatchEventType, number> = {
  new_item: 0x5865f2,
  became_high_bidder: 0x2ecc71,
  outbid: 0xe74c3c,
  auction_ending_soon: 0xf1c40f,
  auction_won: 0x00b894,
  auction_lost: 0x95a5a6,
  item_shipped: 0x3498db,
  item_delivered: 0x2ecc71
};

const SHIPPING_LABELS: Record<ShippingStatus, string> = {
  pending: 'Ausstehend',
  shipped: 'Versendet',
  delivered: 'Zugestellt'
};

export const formatPrice = (money: Money | undefined): string => {
  if (!money) {
    return '–';
  }
  try {
    return new Intl.NumberFormat('de-DE', { style: 'currency', currency: money.currency }).format(money.value);
  } catch {
    return `${money.value.toFixed(2)} ${money.currency}`;
  }
};

export const formatMinutes = (totalMinutes: number): string => {
  const minutes = Math.max(0, Math.floor(totalMinutes));
  if (minutes < 60) {
    return `${minutes} Min.`;
  }
  const hours = Math.floor(minutes / 60);
  if (hours < 24) {
    return `${hours} Std. ${minutes % 60} Min.`;
  }
  return `${Math.floor(hours / 24)} T. ${hours % 24} Std.`;
};

export const formatTimeRemaining = (endTime: string | undefined, now: Date): string | undefined => {
  if (!endTime) {
    return undefined;
  }
  const end = Date.parse(endTime);
  if (!Number.isFinite(end)) {
    return undefined;
  }
  const remaining = end - now.getTime();
  return remaining <= 0 ? 'Beendet' : formatMinutes(remaining / 60_000);
};

const truncate = (value: string, max: number): string => (value.length > max ? `${value.slice(0, max - 1)}…` : value);

const describeSeller = (item: ItemRecord): string | undefined => {
  if (!item.sellerUsername) {
    return undefined;
  }
  const details: string[] = [];
  if (item.sellerFeedbackScore !== undefined) {
    details.push(`${item.sellerFeedbackScore}`);
  }
  if (item.sellerPositivePercent !== undefined) {
    details.push(`${item.sellerPositivePercent}%`);
  }
  return details.length > 0 ? `${item.sellerUsername} (${details.join(', ')})` : item.sellerUsername;
};

export const buildEventEmbed = (event: WatchEvent, now: Date = new Date()): EmbedBuilder => {
  const { item } = event;
  const embed = new EmbedBuilder()
    .setTitle(truncate(`${EVENT_LABELS[event.type]}: ${item.title}`, MAX_TITLE_LENGTH))
    .setColor(EVENT_COLORS[event.type])
    .setFooter({ text: `Konto ${event.account}` })
    .setTimestamp(now);

  if (item.itemUrl) {
    embed.setURL(item.itemUrl);
  }
  if (item.imageUrl) {
    embed.setThumbnail(item.imageUrl);
  }
  if (event.type === 'new_item' && event.searchQuery) {
    embed.setDescription(`Suche: ${event.searchQuery}`);
  }

  embed.addFields({ name: 'Preis', value: formatPrice(item.currentPrice), inline: true });

  if (event.type === 'auction_ending_soon') {
    embed.addFields({ name: 'Restzeit', value: formatMinutes(event.minutesRemaining), inline: true });
  } else if (event.type !== 'auction_won' && event.type !== 'auction_lost') {
    const remaining = formatTimeRemaining(item.endTime, now);
    if (remaining) {
      embed.addFields({ name: 'Restzeit', value: remaining, inline: true });
    }
  }

  if (item.bidCount !== undefined) {
    embed.addFields({ name: 'Gebote', value: String(item.bidCount), inline: true });
  }
  if (item.listingType) {
    embed.addFields({ name: 'Angebotsart', value: item.listingType, inline: true });
  }
  const seller = describeSeller(item);
  if (seller) {
    embed.addFields({ name: 'Verkäufer', value: seller, inline: true });
  }
  if (item.shippingStatus) {
    embed.addFields({ name: 'Versand', value: SHIPPING_LABELS[item.shippingStatus], inline: true });
  }
  if (item.trackingNumber) {
    embed.addFields({ name: 'Sendungsnummer', value: item.trackingNumber, inline: true });
  }
  return embed;
};

export class DiscordNotifier implements Publisher {
  private readonly rejected = new Set<string>();

  constructor(
    private readonly send: MessageSink,
    private readonly now: () => Date = () => new Date()
  ) {}

  async publishEvent(event: WatchEvent): Promise<void> {
    await this.send({ embeds: [buildEventEmbed(event, this.now())] });
  }

  async publishSnapshot(view: SnapshotView): Promise<void> {
    const key = snapshotKey(view.account, view.scope);
    if (view.health === 'ok') {
      this.rejected.delete(key);
      return;
    }
    if (view.health !== 'rejected' || this.rejected.has(key)) {
      return;
    }
    this.rejected.add(key);
    const scope = describeScope(view.scope);
    logger.warn(`Zugangsdaten für ${view.account}/${scope} abgelehnt, Hinweis wird gepostet`);
    await this.send({
      content: `⚠️ eBay hat den Zugriff für Konto **${view.account}** (${scope}) abgelehnt (${view.lastError ?? 'ohne Details'}). Bitte Token prüfen.`
    });
  }

  dropSnapshot(account: string, scope: CoordinatorScope): void {
    this.rejected.delete(snapshotKey(account, scope));
  }
}
