import { NotificationPayload } from "../../types";
import { NotificationPresenter } from "../../services/twilio";

export class FakePresenter implements NotificationPresenter {
  readonly presented: NotificationPayload[] = [];
  /** Number of upcoming calls that throw */
  failuresLeft = 0;

  async present(payload: NotificationPayload): Promise<string> {
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error("delivery failed");
    }
    this.presented.push(payload);
    return `SM${this.presented.length}`;
  }
}
