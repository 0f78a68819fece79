/**
 * Event generation utilities
 *
 * An event payload is generated like a composite type; its codec also
 * carries the method name the event is delivered under, so that a
 * dispatcher can find the decoder for an inbound message.
 */

import type { Event } from '../types.js';
import { toTypeName } from './naming.js';
import { renderRecord } from './type-generator.js';
import { docComment, literal, statusTags } from './text.js';

/**
 * Name of the interface and codec generated for an event
 *
 * @param event - Event from the model
 * @param taken - Names already declared by the module (types and imports)
 */
export function eventName(event: Event, taken: readonly string[] = []): string {
  let name = toTypeName(event.name);
  if (taken.includes(name)) {
    name += 'Event';
  }
  while (taken.includes(name)) {
    name += '_';
  }
  return name;
}

/**
 * Generates the payload interface and codec of an event
 */
export function generateEvent(event: Event, taken: readonly string[] = []): string {
  const name = eventName(event, taken);
  const method = `${event.domain}.${event.name}`;

  const doc = docComment([event.description, statusTags(event)]);
  return (
    doc +
    renderRecord(name, method, event.parameters, `util.EventCodec<${name}>`, [`method: ${literal(method)},`])
  );
}
