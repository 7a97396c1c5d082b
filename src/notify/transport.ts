/** Best-effort delivery of a text to a recipient (buyer or operator). */
export interface NotificationTransport {
  send(recipient: string, text: string): Promise<void>;
}
