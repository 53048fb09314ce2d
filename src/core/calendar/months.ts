import type { Cell } from './types.js';
import { cellText } from './gridCell.js';

export const MONTHS: Readonly<Record<string, number>> = {
  ЯНВАРЬ: 1,
  ФЕВРАЛЬ: 2,
  МАРТ: 3,
  АПРЕЛЬ: 4,
  МАЙ: 5,
  ИЮНЬ: 6,
  ИЮЛЬ: 7,
  АВГУСТ: 8,
  СЕНТЯБРЬ: 9,
  ОКТЯБРЬ: 10,
  НОЯБРЬ: 11,
  ДЕКАБРЬ: 12,
};

/** Genitive month names, for dates in messages ("5 июля"). */
export const MONTH_NAMES_GENITIVE: readonly string[] = [
  'января',
  'февраля',
  'марта',
  'апреля',
  'мая',
  'июня',
  'июля',
  'августа',
  'сентября',
  'октября',
  'ноября',
  'декабря',
];

export function monthOf(cell: Cell): number | null {
  const text = cellText(cell);
  return Object.prototype.hasOwnProperty.call(MONTHS, text) ? (MONTHS[text] ?? null) : null;
}
