import type { Transporter } from "nodemailer";
import type { Store, SearchOrder } from "../db/store";
import type { SearchOrderNotification } from "../db/schema";

export interface NotifierOptions {
  from: string;
  appBaseUrl: string;
}

function formatSlot(notification: SearchOrderNotification): string {
  const price =
    notification.price === null ? "" : ` - ${notification.price.toFixed(2)} ${notification.currency ?? ""}`.trimEnd();
  const link = notification.bookingUrl ? `\n    Book: ${notification.bookingUrl}` : "";
  return `  ${notification.date} ${notification.startTime}-${notification.endTime}  ${notification.locationName}, ${notification.courtName}${price}${link}`;
}

export function renderNotificationMail(
  order: SearchOrder,
  notifications: SearchOrderNotification[],
  appBaseUrl: string
): { subject: string; text: string } {
  const count = notifications.length;
  const subject = `${count} new padel ${count === 1 ? "slot" : "slots"} for your search on ${order.date}`;
  const text = `
New courts matching your search order #${order.id} (${order.startTime}-${order.endTime}, ${order.durationMinutes} min):

${notifications.map(formatSlot).join("\n")}

Manage your search orders: ${appBaseUrl}/search-orders/${order.id}
  `.trim();

  return { subject, text };
}

/**
 * E-mails new search order matches to the order's address. Rows are marked
 * notified only once the mail went out; unsent rows stay visible in the API.
 */
export class MailNotifier {
  constructor(
    private readonly store: Store,
    private readonly transporter: Transporter | null,
    private readonly options: NotifierOptions
  ) {}

  async notify(order: SearchOrder, notifications: SearchOrderNotification[]): Promise<number> {
    if (notifications.length === 0) return 0;

    if (!this.transporter || !order.notifyEmail) {
      console.log(`[Notify - disabled] Order ${order.id}: ${notifications.length} new matches not mailed`);
      return 0;
    }

    const { subject, text } = renderNotificationMail(order, notifications, this.options.appBaseUrl);

    try {
      await this.transporter.sendMail({
        from: this.options.from,
        to: order.notifyEmail,
        subject: `[padelwatch] ${subject}`,
        text,
      });
    } catch (error) {
      console.error(`[Notify - failed] Order ${order.id}:`, error);
      return 0;
    }

    const marked = this.store.markNotified(
      notifications.map((notification) => notification.id),
      new Date().toISOString()
    );
    console.log(`[Notify - sent] Order ${order.id}: ${marked} matches to ${order.notifyEmail}`);
    return marked;
  }
}
