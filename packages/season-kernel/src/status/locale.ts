// Display strings. Dates read "15 February 2025" / "15 februari 2025".

import type { LocaleV1, SeasonLabelV1 } from "@seasonwatch/contracts";
import { parseCalendarDate, type CalendarDate } from "../calendar/calendar_date";

const SEASON_TEXT: Record<LocaleV1, Record<SeasonLabelV1, string>> = {
  en: { unknown: "Unknown", winter: "Winter", spring: "Spring", summer: "Summer", autumn: "Autumn" },
  sv: { unknown: "Okänd", winter: "Vinter", spring: "Vår", summer: "Sommar", autumn: "Höst" },
};

const MONTH_TEXT: Record<LocaleV1, readonly string[]> = {
  en: [
    "January",
    "February",
    "March",
    "April",
    "May",
    "June",
    "July",
    "August",
    "September",
    "October",
    "November",
    "December",
  ],
  sv: [
    "januari",
    "februari",
    "mars",
    "april",
    "maj",
    "juni",
    "juli",
    "augusti",
    "september",
    "oktober",
    "november",
    "december",
  ],
};

export function seasonText(label: SeasonLabelV1, locale: LocaleV1): string {
  return SEASON_TEXT[locale][label];
}

export function formatCalendarDate(date: CalendarDate, locale: LocaleV1): string {
  const { year, month, day } = parseCalendarDate(date);
  return `${day} ${MONTH_TEXT[locale][month - 1]} ${year}`;
}

export function formatTemperature(meanC: number): string {
  return `${meanC.toFixed(1)}°C`;
}
