import {
  InvalidParameterError,
  LocationNotFoundError,
  SearchOrderNotFoundError,
  errorMessage,
} from "../errors";
import { assertOwnerOrAdmin } from "./access";
import { detectNewMatches, seenMatches } from "./change-detector";
import {
  addDays,
  assertPositiveDuration,
  createWindow,
  dateRange,
  formatTime,
  parseDate,
  parseTime,
  todayIn,
} from "./time-window";
import type { MailNotifier } from "./notifier";
import type { SearchEngine } from "./search";
import type { SearchOrder, SearchOrderFields, SearchOrderPatch, Store } from "../db/store";
import type { SearchOrderNotification } from "../db/schema";
import type { CourtConfig, CourtType, CurrentUser, SearchResult } from "../types";

export const MAX_ORDER_DAYS = 14;

export interface SearchOrderInput {
  locationIds: number[];
  date: string;
  endDate?: string | null;
  startTime: string;
  endTime: string;
  durationMinutes: number;
  courtType?: CourtType;
  courtConfig?: CourtConfig;
  notifyEmail?: string | null;
}

export type SearchOrderUpdate = Partial<SearchOrderInput> & { isActive?: boolean };

export interface OrderCheck {
  searchOrderId: number;
  deactivated: boolean;
  dates: string[];
  failedDates: string[];
  matches: number;
  failedLocations: number;
  newNotifications: SearchOrderNotification[];
  mailed: number;
}

export interface SearchOrderServiceOptions {
  timezone: string;
}

export class SearchOrderService {
  constructor(
    private readonly store: Store,
    private readonly engine: SearchEngine,
    private readonly notifier: MailNotifier,
    private readonly options: SearchOrderServiceOptions,
    private readonly now: () => Date = () => new Date()
  ) {}

  create(user: CurrentUser, input: SearchOrderInput): SearchOrder {
    const { fields, locationIds } = this.validate(input);
    const order = this.store.createSearchOrder(user.id, fields, locationIds);
    console.log(`[Orders] Created order ${order.id} for ${user.id}`);
    return order;
  }

  list(userId: string): SearchOrder[] {
    return this.store.listSearchOrders(userId);
  }

  get(id: number, user: CurrentUser): SearchOrder {
    const order = this.store.getSearchOrder(id);
    if (!order) {
      throw new SearchOrderNotFoundError(id);
    }
    assertOwnerOrAdmin(user, order.userId, `search order ${id}`);
    return order;
  }

  /**
   * Apply a partial update. The merged order is validated as a whole.
   */
  update(id: number, patch: SearchOrderUpdate, user: CurrentUser): SearchOrder {
    const current = this.get(id, user);

    const merged: SearchOrderInput = {
      locationIds: patch.locationIds ?? current.locationIds,
      date: patch.date ?? current.date,
      endDate: patch.endDate === undefined ? current.endDate : patch.endDate,
      startTime: patch.startTime ?? current.startTime,
      endTime: patch.endTime ?? current.endTime,
      durationMinutes: patch.durationMinutes ?? current.durationMinutes,
      courtType: patch.courtType ?? current.courtType,
      courtConfig: patch.courtConfig ?? current.courtConfig,
      notifyEmail: patch.notifyEmail === undefined ? current.notifyEmail : patch.notifyEmail,
    };
    const { fields, locationIds } = this.validate(merged);

    const changes: SearchOrderPatch = { ...fields };
    if (patch.isActive !== undefined) changes.isActive = patch.isActive;

    const updated = this.store.updateSearchOrder(
      id,
      changes,
      patch.locationIds === undefined ? undefined : locationIds
    );
    if (!updated) {
      throw new SearchOrderNotFoundError(id);
    }
    return updated;
  }

  delete(id: number, user: CurrentUser): void {
    this.get(id, user);
    this.store.deleteSearchOrder(id);
    console.log(`[Orders] Deleted order ${id}`);
  }

  /**
   * Run one order's search right away, outside the schedule
   */
  async executeNow(id: number, user: CurrentUser): Promise<OrderCheck> {
    return this.check(this.get(id, user));
  }

  listNotifications(id: number, user: CurrentUser): SearchOrderNotification[] {
    this.get(id, user);
    return this.store.listNotifications(id);
  }

  markNotificationRead(id: number, notificationId: number, user: CurrentUser): SearchOrderNotification {
    this.get(id, user);
    const notification = this.store.markNotificationRead(id, notificationId);
    if (!notification) {
      throw new InvalidParameterError(`Notification ${notificationId} does not belong to search order ${id}`);
    }
    return notification;
  }

  /**
   * Search every remaining date of an order, record each availability not
   * yet notified for it, and mail the new ones. An order whose last date
   * has passed, or whose locations have all been removed, is deactivated
   * instead. A date that could not be searched at all is reported in
   * `failedDates`; the check throws only when every date failed.
   */
  async check(order: SearchOrder): Promise<OrderCheck> {
    const today = todayIn(this.options.timezone, this.now());
    const lastDate = order.endDate ?? order.date;

    if (lastDate < today) {
      return this.deactivate(order, `ended on ${lastDate}`);
    }
    // An empty list would mean "every location" to the search engine
    if (order.locationIds.length === 0) {
      return this.deactivate(order, "has no locations left");
    }

    const dates = dateRange(order.date < today ? today : order.date, lastDate);
    const owner: CurrentUser = { id: order.userId, isAdmin: false };
    const results: SearchResult[] = [];
    const failedDates: string[] = [];
    let firstError: unknown = null;

    for (const date of dates) {
      try {
        results.push(
          await this.engine.search(
            {
              date,
              windowStart: order.startTime,
              windowEnd: order.endTime,
              durationMinutes: order.durationMinutes,
              courtType: order.courtType,
              courtConfig: order.courtConfig,
              locationIds: order.locationIds,
              liveSearch: true,
              forceLiveSearch: false,
            },
            owner
          )
        );
      } catch (error) {
        console.error(`[Orders] Order ${order.id} on ${date} failed: ${errorMessage(error)}`);
        firstError ??= error;
        failedDates.push(date);
      }
    }

    if (results.length === 0) {
      throw firstError;
    }

    const seen = seenMatches(this.store.listNotifiedSlots(order.id));
    const inserted = this.store.insertNotifications(detectNewMatches(order.id, results, seen));
    this.store.markSearchOrderChecked(order.id, this.now().toISOString());

    const mailed = await this.notifier.notify(order, inserted);

    return {
      searchOrderId: order.id,
      deactivated: false,
      dates,
      failedDates,
      matches: results.reduce((sum, result) => sum + result.totalSlots, 0),
      failedLocations: results.reduce((sum, result) => sum + result.failedLocations.length, 0),
      newNotifications: inserted,
      mailed,
    };
  }

  private deactivate(order: SearchOrder, reason: string): OrderCheck {
    this.store.updateSearchOrder(order.id, { isActive: false });
    console.log(`[Orders] Order ${order.id} ${reason}, deactivated`);
    return {
      searchOrderId: order.id,
      deactivated: true,
      dates: [],
      failedDates: [],
      matches: 0,
      failedLocations: 0,
      newNotifications: [],
      mailed: 0,
    };
  }

  private validate(input: SearchOrderInput): { fields: SearchOrderFields; locationIds: number[] } {
    const locationIds = [...new Set(input.locationIds)];
    if (locationIds.length === 0) {
      throw new InvalidParameterError("A search order needs at least one location");
    }
    for (const locationId of locationIds) {
      if (!this.store.getLocation(locationId)) {
        throw new LocationNotFoundError(locationId);
      }
    }

    const date = parseDate(input.date);
    const endDate = input.endDate ? parseDate(input.endDate) : null;
    if (endDate !== null) {
      if (endDate < date) {
        throw new InvalidParameterError(`End date ${endDate} is before start date ${date}`);
      }
      if (endDate > addDays(date, MAX_ORDER_DAYS - 1)) {
        throw new InvalidParameterError(`A search order spans at most ${MAX_ORDER_DAYS} days`);
      }
    }

    const window = createWindow(parseTime(input.startTime), parseTime(input.endTime));
    assertPositiveDuration(input.durationMinutes);
    if (input.durationMinutes > window.end - window.start) {
      throw new InvalidParameterError(
        `Duration ${input.durationMinutes} min does not fit in ${formatTime(window.start)}-${formatTime(window.end)}`
      );
    }

    return {
      locationIds,
      fields: {
        date,
        endDate: endDate === date ? null : endDate,
        startTime: formatTime(window.start),
        endTime: formatTime(window.end),
        durationMinutes: input.durationMinutes,
        courtType: input.courtType ?? "all",
        courtConfig: input.courtConfig ?? "all",
        notifyEmail: input.notifyEmail ?? null,
      },
    };
  }
}
