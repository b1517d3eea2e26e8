import { SlashCommandBuilder, SlashCommandSubcommandBuilder } from 'discord.js';
import { EBAY_SITES, LISTING_TYPES } from '../core/search-definition.js';
import { REFRESH_TARGETS } from './watch.js';

const TARGET_LABELS: Record<(typeof REFRESH_TARGETS)[number], string> = {
  all: 'Alles',
  bids: 'Gebote',
  watchlist: 'Beobachtungsliste',
  purchases: 'Käufe',
  searches: 'Gespeicherte Suchen'
};

const LISTING_TYPE_LABELS: Record<(typeof LISTING_TYPES)[number], string> = {
  auction: 'Nur Auktionen',
  buy_it_now: 'Nur Sofort-Kaufen',
  both: 'Beides'
};

const withAccount = (subcommand: SlashCommandSubcommandBuilder): SlashCommandSubcommandBuilder =>
  subcommand.addStringOption((option) =>
    option.setName('account').setDescription('Konto (optional, wenn nur eines konfiguriert ist)')
  );

// Required options have to come first, so `account` is added after the query of search-create.
const withSearchFields = (
  subcommand: SlashCommandSubcommandBuilder,
  queryRequired: boolean
): SlashCommandSubcommandBuilder =>
  subcommand
    .addStringOption((option) => option.setName('query').setDescription('Suchbegriff').setRequired(queryRequired))
    .addStringOption((option) => {
      option.setName('site').setDescription('eBay-Marktplatz');
      Object.entries(EBAY_SITES).forEach(([code, site]) => option.addChoices({ name: `${code} (${site})`, value: site }));
      return option;
    })
    .addStringOption((option) => option.setName('category').setDescription('eBay-Kategorie-ID'))
    .addNumberOption((option) => option.setName('min_price').setDescription('Mindestpreis').setMinValue(0))
    .addNumberOption((option) => option.setName('max_price').setDescription('Höchstpreis').setMinValue(0))
    .addStringOption((option) => {
      option.setName('listing_type').setDescription('Angebotsart');
      LISTING_TYPES.forEach((value) => option.addChoices({ name: LISTING_TYPE_LABELS[value], value }));
      return option;
    })
    .addIntegerOption((option) =>
      option.setName('interval').setDescription('Aktualisierungsintervall in Minuten').setMinValue(1)
    );

export const buildWatchCommand = () =>
  new SlashCommandBuilder()
    .setName('watch')
    .setDescription('eBay-Gebote, Beobachtungsliste, Käufe und Suchen überwachen.')
    .addSubcommand((subcommand) =>
      withAccount(
        subcommand
          .setName('refresh')
          .setDescription('Sofort aktualisieren')
          .addStringOption((option) => {
            option.setName('target').setDescription('Was aktualisiert werden soll');
            REFRESH_TARGETS.forEach((value) => option.addChoices({ name: TARGET_LABELS[value], value }));
            return option;
          })
          .addStringOption((option) =>
            option.setName('search_id').setDescription('Nur diese gespeicherte Suche aktualisieren')
          )
      )
    )
    .addSubcommand((subcommand) =>
      withAccount(withSearchFields(subcommand.setName('search-create').setDescription('Neue Suche anlegen'), true))
    )
    .addSubcommand((subcommand) =>
      withSearchFields(
        withAccount(
          subcommand
            .setName('search-update')
            .setDescription('Gespeicherte Suche ändern')
            .addStringOption((option) => option.setName('search_id').setDescription('ID der Suche').setRequired(true))
        ),
        false
      ).addStringOption((option) =>
        option.setName('clear').setDescription('Felder leeren, kommagetrennt: category, min_price, max_price')
      )
    )
    .addSubcommand((subcommand) =>
      withAccount(
        subcommand
          .setName('search-delete')
          .setDescription('Gespeicherte Suche löschen')
          .addStringOption((option) => option.setName('search_id').setDescription('ID der Suche').setRequired(true))
      )
    )
    .addSubcommand((subcommand) =>
      withAccount(subcommand.setName('search-list').setDescription('Gespeicherte Suchen anzeigen'))
    )
    .addSubcommand((subcommand) =>
      withAccount(subcommand.setName('status').setDescription('Zustand aller Abrufe anzeigen'))
    )
    .addSubcommand((subcommand) =>
      withAccount(
        subcommand
          .setName('usage')
          .setDescription('Geschätzte API-Nutzung anzeigen')
          .addBooleanOption((option) => option.setName('reset').setDescription('Zähler danach zurücksetzen'))
      )
    );
