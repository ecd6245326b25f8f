// src/notify.ts
import { setTimeout as sleep } from "node:timers/promises";
import { createTransport } from "nodemailer";
import type { MailConfig } from "./config.js";
import type { Database } from "./db.js";
import { describeError } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";

export interface Subscriber {
  name: string;
  email: string;
}

export interface MailMessage {
  to: string;
  subject: string;
  text: string;
}

export interface Mailer {
  send(message: MailMessage): Promise<void>;
}

export const NOTIFICATION_SUBJECT = "New photo(s) added";

export function createSmtpMailer(mail: MailConfig): Mailer {
  const transport = createTransport({
    host: mail.host,
    port: mail.port,
    secure: mail.secure,
    auth: mail.user ? { user: mail.user, pass: mail.pass ?? "" } : undefined,
  });
  return {
    async send({ to, subject, text }) {
      await transport.sendMail({ from: mail.from, to, subject, text });
    },
  };
}

// Members of every group linked to the album, each (name, email) once.
export function resolveSubscribers(db: Database, album: string): Subscriber[] {
  return db
    .prepare<[string], Subscriber>(
      `SELECT DISTINCT m.name AS name, m.email AS email
         FROM albums a
         JOIN members m ON m.group_id = a.group_id
        WHERE a.name = ?
        ORDER BY m.name, m.email`,
    )
    .all(album);
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

// 11/25/2024 at 02:05 PM
export function formatSendTime(d: Date): string {
  const hours = d.getHours();
  const h12 = hours % 12 === 0 ? 12 : hours % 12;
  const ampm = hours < 12 ? "AM" : "PM";
  return (
    `${pad2(d.getMonth() + 1)}/${pad2(d.getDate())}/${d.getFullYear()}` +
    ` at ${pad2(h12)}:${pad2(d.getMinutes())} ${ampm}`
  );
}

export function buildMessage(
  subscriber: Subscriber,
  album: string,
  count: number,
  when: Date,
): MailMessage {
  return {
    to: subscriber.email,
    subject: NOTIFICATION_SUBJECT,
    text: `${subscriber.name}, ${count} new photo(s) added to the album ${album} on ${formatSendTime(when)}.`,
  };
}

export interface DispatchOptions {
  logger?: Logger;
  now?: () => Date;
  sendIntervalMs?: number;
}

export interface DispatchResult {
  sent: number;
  failed: number;
}

/**
 * Send one message per subscriber per album. A failed delivery is logged and
 * counted; the remaining subscribers are still attempted.
 */
export async function dispatchNotifications(
  db: Database,
  counts: ReadonlyMap<string, number>,
  mailer: Mailer,
  {
    logger = new NullLogger(),
    now = () => new Date(),
    sendIntervalMs = 0,
  }: DispatchOptions = {},
): Promise<DispatchResult> {
  let sent = 0;
  let failed = 0;
  let first = true;
  for (const [album, count] of counts) {
    const subscribers = resolveSubscribers(db, album);
    if (!subscribers.length) {
      logger.info("no subscribers for album", { album, count });
      continue;
    }
    for (const subscriber of subscribers) {
      if (!first && sendIntervalMs > 0) {
        await sleep(sendIntervalMs);
      }
      first = false;
      try {
        await mailer.send(buildMessage(subscriber, album, count, now()));
        sent += 1;
        logger.info("alert sent", { album, to: subscriber.email });
      } catch (err) {
        failed += 1;
        logger.error("alert failed", {
          album,
          to: subscriber.email,
          error: describeError(err),
        });
      }
    }
  }
  return { sent, failed };
}
