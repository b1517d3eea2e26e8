import { XMLParser } from 'fast-xml-parser';
import { UpstreamRejectedError, UpstreamUnavailableError } from '../core/errors.js';
import { ItemRecord, Money, ShippingStatus } from '../core/types.js';
import { itemUrl, sellerUrl } from './ebay-sites.js';

export type BuyingList = 'BidList' | 'WatchList' | 'WonList';

export type BuyingPage = {
  items: ItemRecord[];
  totalPages: number;
};

type XmlNode = Record<string, unknown>;

// Error codes the Trading API returns for invalid, expired or revoked tokens.
const TOKEN_ERROR_CODES = new Set(['931', '932', '16110', '17470']);

const ARRAY_TAGS = new Set(['Item', 'OrderTransaction', 'Transaction', 'Errors']);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  isArray: (tagName) => ARRAY_TAGS.has(tagName)
});

const asRecord = (value: unknown): XmlNode | undefined => {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return undefined;
  }
  return value as XmlNode;
};

const asList = (value: unknown): unknown[] => {
  if (Array.isArray(value)) {
    return value;
  }
  return value === undefined || value === null ? [] : [value];
};

const at = (node: unknown, ...keys: string[]): unknown =>
  keys.reduce<unknown>((current, key) => {
    const record = asRecord(current);
    if (record) {
      return record[key];
    }
    // Repeated elements come back as arrays; follow the first one.
    const [first] = asList(current);
    return asRecord(first)?.[key];
  }, node);

const text = (value: unknown): string | undefined => {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  const record = asRecord(value);
  return record ? text(record['#text']) : undefined;
};

const toNumber = (value: unknown): number | undefined => {
  const raw = text(value);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const toMoney = (value: unknown): Money | undefined => {
  const amount = toNumber(value);
  if (amount === undefined || amount < 0) {
    return undefined;
  }
  return {
    value: amount,
    currency: text(asRecord(value)?.['@_currencyID']) ?? 'GBP'
  };
};

const firstMoney = (...candidates: unknown[]): Money | undefined => {
  for (const candidate of candidates) {
    const money = toMoney(candidate);
    if (money) {
      return money;
    }
  }
  return undefined;
};

const describeListingType = (raw: string | undefined): string | undefined => {
  if (raw === 'Chinese') {
    return 'Auction';
  }
  if (raw === 'FixedPriceItem') {
    return 'Buy It Now';
  }
  return raw;
};

export const parseXml = (xml: string): XmlNode => {
  const parsed: unknown = parser.parse(xml);
  const root = asRecord(parsed);
  if (!root) {
    throw new UpstreamUnavailableError('Antwort der Trading API ist kein XML-Dokument');
  }
  return root;
};

export const readResponse = (root: XmlNode, callName: string): XmlNode => {
  const response = asRecord(root[`${callName}Response`]);
  if (!response) {
    throw new UpstreamUnavailableError(`${callName}: unerwartete Antwort`);
  }
  if (text(response.Ack) !== 'Failure') {
    return response;
  }
  const errors = asList(response.Errors);
  const codes = errors.map((error) => text(at(error, 'ErrorCode'))).filter((code): code is string => Boolean(code));
  const message = errors.map((error) => text(at(error, 'LongMessage')) ?? text(at(error, 'ShortMessage'))).find(Boolean);
  const description = `${callName} fehlgeschlagen (${codes.join(', ') || 'unbekannt'}): ${message ?? 'keine Details'}`;
  if (codes.some((code) => TOKEN_ERROR_CODES.has(code))) {
    throw new UpstreamRejectedError(description);
  }
  throw new UpstreamUnavailableError(description);
};

export const parseUserId = (response: XmlNode): string | undefined => text(at(response, 'User', 'UserID'));

type ItemKind = 'bid' | 'watch';

export const parseTradingItem = (
  node: unknown,
  kind: ItemKind,
  site: string,
  username: string | undefined
): ItemRecord | undefined => {
  const itemId = text(at(node, 'ItemID'));
  if (!itemId) {
    return undefined;
  }
  const record: ItemRecord = {
    itemId,
    title: text(at(node, 'Title')) ?? itemId,
    listingType: describeListingType(text(at(node, 'ListingType'))),
    currentPrice: firstMoney(
      at(node, 'SellingStatus', 'CurrentPrice'),
      at(node, 'SellingStatus', 'ConvertedCurrentPrice')
    ),
    endTime: text(at(node, 'ListingDetails', 'EndTime')),
    itemUrl:
      text(at(node, 'ListingDetails', 'ViewItemURL')) ??
      text(at(node, 'ListingInfo', 'ViewItemURL')) ??
      itemUrl(site, itemId),
    imageUrl: text(at(node, 'PictureDetails', 'PictureURL'))
  };

  const seller = text(at(node, 'Seller', 'UserID'));
  if (seller) {
    record.sellerUsername = seller;
    record.sellerFeedbackScore = toNumber(at(node, 'Seller', 'FeedbackScore'));
    record.sellerPositivePercent = toNumber(at(node, 'Seller', 'PositiveFeedbackPercent'));
    record.sellerUrl = sellerUrl(site, seller);
    record.sellerLocation =
      text(at(node, 'Seller', 'RegistrationAddress', 'Country')) ??
      text(at(node, 'Seller', 'Site')) ??
      text(at(node, 'Location'));
  }

  if (kind === 'bid') {
    const highBidder = text(at(node, 'SellingStatus', 'HighBidder', 'UserID'));
    if (username) {
      record.isHighBidder = highBidder !== undefined && highBidder.toLowerCase() === username.toLowerCase();
    }
    const reserveMet = text(at(node, 'ReserveMet')) ?? text(at(node, 'SellingStatus', 'ReserveMet'));
    if (reserveMet !== undefined) {
      record.reserveMet = reserveMet.toLowerCase() === 'true';
    }
    record.bidCount = toNumber(at(node, 'SellingStatus', 'BidCount'));
  }

  if (kind === 'watch') {
    record.watchers = toNumber(at(node, 'WatchCount'));
  }

  return record;
};

const deriveShippingStatus = (orderTransaction: unknown, transaction: unknown): { status: ShippingStatus; tracking?: string } => {
  let status: ShippingStatus = 'pending';
  let tracking: string | undefined;

  const order = at(orderTransaction, 'Order');
  if (order !== undefined) {
    const orderStatus = text(at(order, 'OrderStatus'))?.toLowerCase() ?? '';
    if (orderStatus.includes('deliver') || orderStatus.includes('complete')) {
      status = 'delivered';
    } else if (orderStatus.includes('ship') || orderStatus.includes('active')) {
      status = 'shipped';
    }
    tracking =
      text(at(order, 'ShippingDetails', 'ShipmentTrackingDetails', 'ShipmentTrackingNumber')) ??
      text(at(order, 'ShippingInfo', 'ShipmentTrackingDetails', 'ShipmentTrackingNumber'));
    if (tracking && status === 'pending') {
      status = 'shipped';
    }
  } else {
    const shippingStatus = text(at(transaction, 'Status', 'ShippingStatus'))?.toLowerCase() ?? '';
    if (shippingStatus.includes('delivered')) {
      status = 'delivered';
    } else if (shippingStatus.includes('shipped')) {
      status = 'shipped';
    }
  }

  if (status === 'pending' && text(at(transaction, 'ShippedTime'))) {
    status = 'shipped';
  }
  return { status, tracking };
};

export const parsePurchase = (orderTransaction: unknown, site: string): ItemRecord | undefined => {
  const transaction = at(orderTransaction, 'Transaction');
  const item = at(transaction, 'Item');
  const itemId = text(at(item, 'ItemID'));
  if (!itemId) {
    return undefined;
  }

  const { status, tracking } = deriveShippingStatus(orderTransaction, transaction);
  const record: ItemRecord = {
    itemId,
    title: text(at(item, 'Title')) ?? itemId,
    itemUrl: text(at(item, 'ListingDetails', 'ViewItemURL')) ?? itemUrl(site, itemId),
    currentPrice: firstMoney(
      at(transaction, 'TransactionPrice'),
      at(transaction, 'ActualPrice'),
      at(transaction, 'TotalPrice'),
      at(item, 'SellingStatus', 'CurrentPrice')
    ),
    imageUrl: text(at(item, 'PictureDetails', 'PictureURL')),
    shippingStatus: status,
    trackingNumber: tracking
  };

  const seller = text(at(item, 'Seller', 'UserID'));
  if (seller) {
    record.sellerUsername = seller;
    record.sellerFeedbackScore = toNumber(at(item, 'Seller', 'FeedbackScore'));
    record.sellerPositivePercent = toNumber(at(item, 'Seller', 'PositiveFeedbackPercent'));
    record.sellerUrl = sellerUrl(site, seller);
  }
  return record;
};

export const parseBuyingPage = (
  response: XmlNode,
  list: BuyingList,
  site: string,
  username: string | undefined
): BuyingPage => {
  const section = at(response, list);
  const items: ItemRecord[] = [];

  if (list === 'WonList') {
    for (const orderTransaction of asList(at(section, 'OrderTransactionArray', 'OrderTransaction'))) {
      const parsed = parsePurchase(orderTransaction, site);
      if (parsed) {
        items.push(parsed);
      }
    }
  } else {
    const kind: ItemKind = list === 'BidList' ? 'bid' : 'watch';
    for (const node of asList(at(section, 'ItemArray', 'Item'))) {
      const parsed = parseTradingItem(node, kind, site, username);
      if (parsed) {
        items.push(parsed);
      }
    }
  }

  return {
    items,
    totalPages: toNumber(at(section, 'PaginationResult', 'TotalNumberOfPages')) ?? 1
  };
};

const escapeXml = (value: string): string =>
  value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

export const buildGetUserRequest = (token: string): string =>
  [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<GetUserRequest xmlns="urn:ebay:apis:eBLBaseComponents">',
    `  <RequesterCredentials><eBayAuthToken>${escapeXml(token)}</eBayAuthToken></RequesterCredentials>`,
    '</GetUserRequest>'
  ].join('\n');

export const buildBuyingRequest = (token: string, list: BuyingList, page: number, pageSize: number): string =>
  [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<GetMyeBayBuyingRequest xmlns="urn:ebay:apis:eBLBaseComponents">',
    `  <RequesterCredentials><eBayAuthToken>${escapeXml(token)}</eBayAuthToken></RequesterCredentials>`,
    `  <${list}>`,
    '    <Include>true</Include>',
    `    <Pagination><EntriesPerPage>${pageSize}</EntriesPerPage><PageNumber>${page}</PageNumber></Pagination>`,
    `  </${list}>`,
    '  <DetailLevel>ReturnAll</DetailLevel>',
    '</GetMyeBayBuyingRequest>'
  ].join('\n');
