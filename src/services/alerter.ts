import type { Transporter } from "nodemailer";

export interface AlertOptions {
  from: string;
  to: string[];
  cooldownMinutes: number;
}

export interface OrderFailure {
  searchOrderId: number;
  message: string;
}

/**
 * Operator alerts for scheduler passes that keep failing, with a cooldown
 * between failure mails and one mail on recovery.
 */
export class AlertService {
  private consecutiveFailures: number = 0;
  private lastAlertTime: Date | null = null;

  constructor(
    private readonly transporter: Transporter | null,
    private readonly options: AlertOptions,
    private readonly now: () => Date = () => new Date()
  ) {}

  private isInCooldown(): boolean {
    if (!this.lastAlertTime) return false;
    const elapsed = this.now().getTime() - this.lastAlertTime.getTime();
    return elapsed < this.options.cooldownMinutes * 60 * 1000;
  }

  private async sendAlert(subject: string, body: string, recovery = false): Promise<boolean> {
    if (!this.transporter || this.options.to.length === 0) {
      console.log(`[Alert - disabled] ${subject}`);
      return false;
    }

    // Recovery mails ignore the cooldown
    if (!recovery && this.isInCooldown()) {
      console.log(`[Alert - cooldown] ${subject}`);
      return false;
    }

    try {
      await this.transporter.sendMail({
        from: this.options.from,
        to: this.options.to.join(", "),
        subject: `[padelwatch] ${subject}`,
        text: body,
      });
      this.lastAlertTime = this.now();
      console.log(`[Alert - sent] ${subject}`);
      return true;
    } catch (error) {
      console.error("[Alert - failed]", error);
      return false;
    }
  }

  async onPassFailure(failures: OrderFailure[], ordersChecked: number): Promise<void> {
    this.consecutiveFailures++;

    const subject =
      failures.length === ordersChecked
        ? "Scheduler Failed: All Search Orders"
        : `Scheduler: ${failures.length} Search Orders Failed`;

    const body = `
Scheduler pass failure at ${this.now().toISOString()}

Orders checked: ${ordersChecked}
Orders failed: ${failures.length}
Consecutive failing passes: ${this.consecutiveFailures}

${failures.map((failure) => `  #${failure.searchOrderId}: ${failure.message}`).join("\n")}
    `.trim();

    await this.sendAlert(subject, body);
  }

  async onRecovery(): Promise<void> {
    if (this.consecutiveFailures > 0) {
      await this.sendAlert(
        "Recovered",
        `Scheduler recovered after ${this.consecutiveFailures} consecutive failing passes.`,
        true
      );
      this.consecutiveFailures = 0;
    }
  }

  getConsecutiveFailures(): number {
    return this.consecutiveFailures;
  }
}
