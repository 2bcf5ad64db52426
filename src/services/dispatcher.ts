import { RESTRICTED_KEY, SESSION_OWNED_KEYS, ToolArgs } from '../models/plan';
import { SessionIdentity } from '../models/session';
import { ToolResult, failure } from '../models/toolResult';
import { RowStoreOpener } from './storage';
import { RowStore } from './storage/rowStore';
import { EntitySpec, PICKUP, Resolved, VEHICLE, resolveEntity } from './resolver';
import { withStore, toInteger } from './operations/common';
import { addCar, listCars, retrieveCar, updateCar } from './operations/cars';
import { addPickup, listPickups, retrievePickup, updatePickup } from './operations/pickups';
import { addBuyerSchedule, getBuyerAvailability } from './operations/schedules';
import { DropoffLocator, getClosest } from './operations/dropoffs';
import { sendEscalateMessage } from './operations/escalation';
import { Notifier } from './sms';
import { LogContext } from '../utils/logger';

export interface DispatcherDeps {
  openStore: RowStoreOpener;
  locator: DropoffLocator;
  notifier: Notifier;
}

function withoutNulls(args: ToolArgs): ToolArgs {
  const out: ToolArgs = {};
  for (const [key, value] of Object.entries(args)) {
    if (value !== null && value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

function withoutKeys(args: ToolArgs, keys: readonly string[]): ToolArgs {
  const out: ToolArgs = {};
  for (const [key, value] of Object.entries(args)) {
    if (!keys.includes(key)) {
      out[key] = value;
    }
  }
  return out;
}

/**
 * Maps one validated tool plan onto one operation call. Session-owned values
 * (storage descriptor, lead, buyer, escalation phone) come from the session,
 * never from the model.
 */
export class ToolDispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  async dispatch(name: string, rawArgs: ToolArgs, identity: SessionIdentity, ctx: LogContext = {}): Promise<ToolResult> {
    if (RESTRICTED_KEY in rawArgs) {
      return failure('FORBIDDEN', "I can't set the company's offer. Only staff can do that.", { field: RESTRICTED_KEY });
    }

    const args = withoutKeys(withoutNulls(rawArgs), SESSION_OWNED_KEYS);
    const toolCtx: LogContext = { ...ctx, tool: name };
    const stored = (fn: (store: RowStore) => Promise<ToolResult>): Promise<ToolResult> =>
      withStore(this.deps.openStore, identity.storageDescriptor, name, toolCtx, fn);

    switch (name) {
      case 'car_retrieve':
        return stored((store) => retrieveCar(store, args));

      case 'car_add': {
        const patch: ToolArgs = { ...args, lead_id: toInteger(identity.leadId) ?? identity.leadId };
        return stored((store) => addCar(store, patch));
      }

      case 'car_update':
        return stored((store) =>
          this.resolved(store, VEHICLE, args, (target, patch) => updateCar(store, target.id, patch)),
        );

      case 'get_all_cars':
        return stored((store) => listCars(store));

      case 'pickup_retrieve':
        return stored((store) => retrievePickup(store, args));

      case 'pickup_add':
        return stored((store) => addPickup(store, args));

      case 'pickup_update':
        return stored((store) =>
          this.resolved(store, PICKUP, args, (target, patch) => updatePickup(store, target.id, patch)),
        );

      case 'get_all_pickups':
        return stored((store) => listPickups(store));

      case 'get_buyer_availability':
        return stored((store) => getBuyerAvailability(store, identity.buyerId));

      case 'add_buyer_schedule':
        return stored((store) => addBuyerSchedule(store, identity.buyerId, args));

      case 'get_closest':
        return getClosest(this.deps.locator, args.user_address, args.state, toolCtx);

      case 'send_escalate_message':
        return sendEscalateMessage(this.deps.notifier, identity.escalationPhone, args.message_text, toolCtx);

      default:
        return failure('UNKNOWN_TOOL', 'unknown tool', { name });
    }
  }

  /** Resolves the target record, then hands the operation a patch without the lookup keys. */
  private async resolved(
    store: RowStore,
    spec: EntitySpec,
    args: ToolArgs,
    operation: (target: Resolved, patch: ToolArgs) => Promise<ToolResult>,
  ): Promise<ToolResult> {
    const resolution = await resolveEntity(store, spec, args);
    if (!resolution.ok) {
      return resolution.result;
    }
    return operation(resolution, withoutKeys(args, resolution.consumedKeys));
  }
}
