import type {
  ApiEndpointRecord,
  AuthTokenMap,
  ExtractionResult,
  FallbackEndpointType,
  FallbackTokenKey,
  OutputFormat,
  RpcTokenKey
} from './types.js';

const REGIONAL_HOST = 'https://ap-southeast-2.go.servicem8.com';

/** Request templates; the scraped token is appended after `s_auth=` */
export const API_TEMPLATES: Readonly<Record<RpcTokenKey, string>> = {
  CalendarStoreRequest:
    'https://go.servicem8.com/CalendarStoreRequest?s_cv=&s_form_values=query-start-limit-_dc-callback-records-xaction-end-id-strJobUUID&s_auth=',
  UpdateReminderForJobActivity:
    `${REGIONAL_HOST}/PluginReminders_UpdateReminderForJobActivity?s_form_values=` +
    'strReminderUUID-strOriginalStartDate-strOriginalEndDate-strOriginalStaffUUID-strNewStartDate-strNewEndDate-' +
    'strNewStaffUUID-strNewStaffUUIDList-boolModifyAllFollowingRecurrences&s_auth=',
  SaveRecurringJobSchedule:
    `${REGIONAL_HOST}/PluginReminders_SaveRecurringJobSchedule?s_form_values=` +
    'strReminderUUID-strCustomerUUID-strJobTemplateUUID-strAlertMode-strAllocationWindowUUID-strScheduledStartTime-' +
    'intScheduledDuration-strStaffUUID-strStaffUUIDList-strAlertDescription-strRecurrenceType-strDailyMode-' +
    'strWeeklyMode-strMonthlyMode-strYearlyMode-intDailyInterval-intWeeklyInterval-intWeeklyWeeksAfterCompletion-' +
    'arrWeeklyDayNames-intMonthlyDayEveryMonth-intMonthlyDayEveryMonthInterval-strMonthlyMode2WeekType-' +
    'intMonthlyMode2DayName-intMonthlyMode2MonthInterval-strYearlyMode2WeekType-intYearlyMode1Month-' +
    'intYearlyMode1Day-intYearlyMode2DayName-intYearlyMode2Month-strPatternStartDate-strPatternEndDateMode-' +
    'strPatternEndDate-intPatternEndDateOccurrences-boolCancelReminder&s_auth='
};

const RPC_ORDER: readonly RpcTokenKey[] = [
  'CalendarStoreRequest',
  'UpdateReminderForJobActivity',
  'SaveRecurringJobSchedule'
];

const FALLBACK_TYPES: ReadonlyArray<[FallbackTokenKey, FallbackEndpointType]> = [
  ['GeneralAuth', 'fallback_calendar'],
  ['FallbackAuth', 'fallback_general']
];

/**
 * One record per token found, in template order. Fallback tokens only
 * produce records when no named RPC token exists, and reuse the calendar
 * template.
 */
export function buildApiEndpoints(tokens: AuthTokenMap, cookie: string): ApiEndpointRecord[] {
  const records: ApiEndpointRecord[] = [];

  for (const key of RPC_ORDER) {
    const token = tokens[key];
    if (token) {
      records.push({ url: API_TEMPLATES[key] + token, cookie, s_auth: token });
    }
  }

  if (records.length > 0) {
    return records;
  }

  for (const [key, type] of FALLBACK_TYPES) {
    const token = tokens[key];
    if (token) {
      records.push({ url: API_TEMPLATES.CalendarStoreRequest + token, cookie, s_auth: token, type });
    }
  }

  return records;
}

export function formatResult(records: ApiEndpointRecord[], cookie: string, format: OutputFormat): ExtractionResult {
  if (format === 'list') {
    return records;
  }

  return {
    cookie,
    api_endpoints: records.map(({ url, s_auth, type }) => (type ? { url, s_auth, type } : { url, s_auth }))
  };
}

export function endpointCount(result: ExtractionResult): number {
  return Array.isArray(result) ? result.length : result.api_endpoints.length;
}
