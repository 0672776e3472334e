import {
  DateRange,
  HolidayImportance,
  HolidayPeriod,
  HolidayPeriodType,
} from "../../common/types/holiday-period.type";
import { selectPeriodForRange } from "../../common/utils/holiday.utils";

export interface HolidayTag {
  isHolidayMove: boolean;
  holidayPeriodName: string | null;
  holidayType: HolidayPeriodType | null;
  holidayImportance: HolidayImportance | null;
}

export const EMPTY_HOLIDAY_TAG: HolidayTag = {
  isHolidayMove: false,
  holidayPeriodName: null,
  holidayType: null,
  holidayImportance: null,
};

/**
 * Tag for a move's date range: the winning overlapping period, or an empty
 * tag when nothing overlaps.
 */
export function holidayTagFor(periods: HolidayPeriod[], range: DateRange): HolidayTag {
  const period = selectPeriodForRange(periods, range);
  if (!period) {
    return { ...EMPTY_HOLIDAY_TAG };
  }
  return {
    isHolidayMove: true,
    holidayPeriodName: period.name,
    holidayType: period.type,
    holidayImportance: period.importance,
  };
}
