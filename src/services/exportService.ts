import { stringify } from 'csv-stringify/sync';
import { Actor, Deal, PeriodBounds } from '../types';
import { isWithin } from './periodService';

const COLUMNS = [
  { key: 'id', header: 'Deal ID' },
  { key: 'customer', header: 'Customer' },
  { key: 'setter', header: 'Setter' },
  { key: 'closer', header: 'Closer' },
  { key: 'status', header: 'Status' },
  { key: 'kw', header: 'kW' },
  { key: 'lossReason', header: 'Loss Reason' },
  { key: 'lossDetail', header: 'Loss Detail' },
  { key: 'createdAt', header: 'Created At' },
  { key: 'closedAt', header: 'Closed At' },
  { key: 'canceledAt', header: 'Canceled At' }
];

const actorCell = (actor: Actor | null): string => (actor ? actor.name : '');

/**
 * Deals created or closed inside the period; every deal when no period is given
 */
export const dealsForExport = (deals: Deal[], period: PeriodBounds | null): Deal[] =>
  deals
    .filter(
      deal =>
        period === null ||
        isWithin(new Date(deal.createdAt), period) ||
        (deal.closedAt !== null && isWithin(new Date(deal.closedAt), period))
    )
    .sort((a, b) => a.id - b.id);

/**
 * One CSV row per deal, with a header row
 */
export const exportDealsCsv = (deals: Deal[]): string =>
  stringify(
    deals.map(deal => ({
      id: deal.id,
      customer: deal.customerName,
      setter: actorCell(deal.setter),
      closer: actorCell(deal.closer),
      status: deal.status,
      kw: deal.magnitude ?? '',
      lossReason: deal.lossReason?.code ?? '',
      lossDetail: deal.lossReason?.detail ?? '',
      createdAt: deal.createdAt,
      closedAt: deal.closedAt ?? '',
      canceledAt: deal.canceledAt ?? ''
    })),
    { header: true, columns: COLUMNS }
  );
