// Alert domain events

import type { Alert, AlertEventType, Clock, Event } from '@asms/protocol';
import { createEvent } from '../events/publishers.js';
import { ALERT_DOMAIN } from '../errors.js';
import { alertToMap } from './projections.js';

export function createAlertEvent(type: AlertEventType, alert: Alert, clock?: Clock): Event {
  return createEvent(type, ALERT_DOMAIN, alertToMap(alert), clock);
}
