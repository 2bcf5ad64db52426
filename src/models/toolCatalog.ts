import { ToolName } from './plan';

export interface ToolDescriptor {
  name: ToolName;
  description: string;
  args: readonly string[];
}

const CAR_ATTRIBUTES = [
  'vin',
  'year',
  'make',
  'model',
  'trim',
  'mileage',
  'interior_condition',
  'exterior_condition',
  'seller_ask_cents',
  'created_at',
] as const;

export const TOOL_CATALOG: readonly ToolDescriptor[] = [
  {
    name: 'get_buyer_availability',
    description: "Return all of the buyer's schedule entries, ordered by schedule_time.",
    args: [],
  },
  {
    name: 'add_buyer_schedule',
    description:
      'Schedule a meeting or appointment for the buyer. Requires description and schedule_time; ' +
      'priority is Low, Medium or High. Times that are already booked are rejected.',
    args: ['description', 'schedule_time', 'priority'],
  },
  {
    name: 'car_retrieve',
    description: 'Get car details. Provide any of: car_id, vin, model, make, year.',
    args: ['car_id', 'vin', 'model', 'make', 'year'],
  },
  {
    name: 'car_add',
    description:
      'Create a new car listing when a customer wants to sell a car or gives details for a new listing ' +
      '(upserts by VIN if present). You may set seller_ask_cents, never buyer_offer_cents.',
    args: CAR_ATTRIBUTES,
  },
  {
    name: 'car_update',
    description:
      'Update a car identified by car_id (or vin, model, make, year); supply only the fields to change. ' +
      'You may set seller_ask_cents, never buyer_offer_cents.',
    args: ['car_id', ...CAR_ATTRIBUTES],
  },
  {
    name: 'get_all_cars',
    description: 'Retrieve every car record with all of its details.',
    args: [],
  },
  {
    name: 'pickup_retrieve',
    description: 'Get an existing pickup by pick_up_id, or by the car it belongs to (car_id, vin, model, make, year).',
    args: ['pick_up_id', 'car_id', 'vin', 'model', 'make', 'year'],
  },
  {
    name: 'pickup_add',
    description: 'Create a pickup for an existing car. car_id is required.',
    args: ['car_id', 'address', 'contact_phone', 'pick_up_info', 'dropoff_time'],
  },
  {
    name: 'pickup_update',
    description: 'Update a pickup identified by pick_up_id; supply only the fields to change.',
    args: ['pick_up_id', 'car_id', 'address', 'contact_phone', 'pick_up_info', 'dropoff_time'],
  },
  {
    name: 'get_all_pickups',
    description: 'Retrieve every pickup record with all of its details.',
    args: [],
  },
  {
    name: 'get_closest',
    description: "Find the nearest drop-off location to the customer's address (state is a 2-letter code).",
    args: ['user_address', 'state'],
  },
  {
    name: 'send_escalate_message',
    description:
      'Send an urgent SMS to a human team member. Use this when the customer is frustrated, angry, ' +
      'or needs immediate human help.',
    args: ['message_text'],
  },
];
