// Single-slot mailbox: post replaces, never appends. The version lets a
// reader tell whether the value changed while it was busy elsewhere.

export interface MailboxSnapshot<T> {
  value: T | null;
  version: number;
}

export class Mailbox<T> {
  private value: T | null = null;
  private version = 0;

  post(value: T): void {
    this.value = value;
    this.version += 1;
  }

  clear(): void {
    if (this.value === null) return;
    this.value = null;
    this.version += 1;
  }

  peek(): MailboxSnapshot<T> {
    return { value: this.value, version: this.version };
  }

  isCurrent(version: number): boolean {
    return this.version === version;
  }
}
