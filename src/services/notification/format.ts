import type {
  AggregateSavings,
  Band,
  ComparisonResult,
  CurrentOfferSnapshot,
  Service,
  TariffKind,
  TariffProfile,
} from '../../domain/types.js';
import { SERVICES } from '../../domain/types.js';
import { resultFor } from '../comparison/index.js';
import { findServiceOffer } from '../offers/lookup.js';
import type { SavingsEstimates } from './estimate.js';
import { PROMPT_TEXT } from './messages.js';

export const MAX_DECIMALS_ENERGY = 4;
export const MAX_DECIMALS_COST = 2;

const KIND_LABELS: Record<TariffKind, string> = {
  fixed: 'Fixed',
  variable: 'Variable',
};

const BAND_LABELS: Record<Band, string> = {
  single: 'single-rate',
  two_tier: 'two-tier',
  three_tier: 'three-tier',
};

const SERVICE_HEADINGS: Record<Service, string> = {
  electricity: '💡 <b>Electricity',
  gas: '🔥 <b>Gas',
};

const SERVICE_UNITS: Record<Service, string> = {
  electricity: '€/kWh',
  gas: '€/Smc',
};

const SERVICE_NAMES: Record<Service, string> = {
  electricity: 'electricity',
  gas: 'gas',
};

/**
 * Formats a price the way offers are published: integral values without
 * decimals, otherwise at least two decimals.
 * 72 → "72", 72.5 → "72.50", 0.145 → "0.145", 0.14 → "0.14".
 */
export function formatNumber(value: number, maxDecimals = 3): string {
  const factor = 10 ** maxDecimals;
  const rounded = Math.round(value * factor) / factor;

  if (Number.isInteger(rounded)) {
    return String(rounded);
  }

  const [integerPart, fraction = ''] = rounded.toFixed(maxDecimals).replace(/0+$/, '').split('.');
  return `${integerPart}.${fraction.padEnd(2, '0')}`;
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function rateLabel(service: Service, kind: TariffKind): string {
  if (kind === 'fixed') return 'Fixed price';
  return service === 'electricity' ? 'Spread (PUN +)' : 'Spread (PSV +)';
}

function highlight(text: string, improved: boolean, worsened: boolean): string {
  if (improved) return `<b>${text}</b>`;
  if (worsened) return `<u>${text}</u>`;
  return text;
}

export interface NotificationInput {
  profile: Pick<TariffProfile, 'electricity' | 'gas'>;
  aggregate: AggregateSavings;
  snapshot: CurrentOfferSnapshot;
  updateServices: ReadonlySet<Service>;
  estimates: SavingsEstimates;
}

function formatHeader(isMixed: boolean): string {
  if (isMixed) {
    return (
      '⚖️ <b>Tariff update</b>\n' +
      'A published tariff changed, but it is not automatically cheaper: one component went down, the other went up.\n\n'
    );
  }
  return '⚡️ <b>Good news!</b>\nA tariff cheaper than the one you registered is now available.\n\n';
}

function formatServiceSection(
  service: Service,
  input: NotificationInput,
  result: ComparisonResult,
): string {
  const tariff = service === 'electricity' ? input.profile.electricity : input.profile.gas;
  const offer = findServiceOffer(input.snapshot, input.profile, service);
  if (!tariff || !offer) return '';

  const label = rateLabel(service, tariff.kind);
  const unit = SERVICE_UNITS[service];

  const userEnergy = formatNumber(tariff.energyRate, MAX_DECIMALS_ENERGY);
  const userFee = formatNumber(tariff.commercializationFee, MAX_DECIMALS_COST);
  const newEnergy = highlight(
    `${formatNumber(offer.energyRate, MAX_DECIMALS_ENERGY)} ${unit}`,
    result.energySaving !== undefined,
    result.energyWorsened,
  );
  const newFee = highlight(
    `${formatNumber(offer.commercializationFee, MAX_DECIMALS_COST)} €/year`,
    result.commFeeSaving !== undefined,
    result.commFeeWorsened,
  );

  let section = `${SERVICE_HEADINGS[service]} (${KIND_LABELS[tariff.kind]}, ${BAND_LABELS[tariff.band]}):</b>\n`;
  section += `Your tariff: ${label} ${userEnergy} ${unit}, fee ${userFee} €/year\n`;
  section += `New tariff: ${label} ${newEnergy}, fee ${newFee}\n`;

  if (offer.offerCode) {
    section += `📋 Offer code: <code>${escapeHtml(offer.offerCode)}</code>\n`;
  }

  const estimate = input.estimates[service];
  if (estimate !== undefined && estimate > 0) {
    section += `💰 Based on your ${SERVICE_NAMES[service]} consumption you would save about ${formatNumber(estimate, MAX_DECIMALS_COST)} €/year.\n`;
  }

  return `${section}\n`;
}

function formatFooter(input: NotificationInput): string {
  const mixedWithoutEstimate = SERVICES.some((service) => {
    const result = resultFor(input.aggregate, service);
    return (
      input.updateServices.has(service) &&
      result !== undefined &&
      result.isMixed &&
      input.estimates[service] === undefined
    );
  });

  let footer = '';
  if (mixedWithoutEstimate) {
    footer += '📊 In cases like this the better choice depends on your consumption.\n';
    footer += 'If you want a more precise estimate, add your yearly kWh/Smc with /update.\n\n';
  }
  footer += PROMPT_TEXT;
  return footer;
}

export function formatNotification(input: NotificationInput): string {
  const isMixed = SERVICES.some((service) => {
    const result = resultFor(input.aggregate, service);
    return input.updateServices.has(service) && result !== undefined && result.isMixed;
  });

  let message = formatHeader(isMixed);
  for (const service of SERVICES) {
    const result = resultFor(input.aggregate, service);
    if (!input.updateServices.has(service) || !result) continue;
    message += formatServiceSection(service, input, result);
  }
  message += formatFooter(input);
  return message;
}
