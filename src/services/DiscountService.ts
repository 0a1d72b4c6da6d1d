// nanoid's customAlphabet draws from the platform's cryptographically strong random source.
import { customAlphabet } from 'nanoid';
import { DiscountSettings } from '../config';
import { NotFoundError } from '../errors/httpError';
import { logger } from '../logger';
import { ShopStore } from '../storage/shopStore';

const CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

const log = logger.child({ module: 'discount' });

// Generates discount codes and issues them to sessions outside the nth-order flow.
export class DiscountService {
  private store: ShopStore;
  private settings: DiscountSettings;
  private randomSuffix: () => string;

  constructor(store: ShopStore, settings: DiscountSettings) {
    this.store = store;
    this.settings = settings;
    this.randomSuffix = customAlphabet(CODE_ALPHABET, settings.codeLength);
  }

  // Prefix plus a random uppercase-alphanumeric suffix; uniqueness is probabilistic.
  generateCode(): string {
    return `${this.settings.codePrefix}${this.randomSuffix()}`;
  }

  // Issues the configured percent to a session; a still-unused code is returned unchanged.
  async issueCode(sessionId: string): Promise<string> {
    return this.store.discounts.issue(sessionId, this.generateCode(), this.settings.percent);
  }

  // Admin issuance for a session the store has minted.
  async issueForSession(sessionId: string): Promise<string> {
    if (!(await this.store.sessions.exists(sessionId))) {
      throw new NotFoundError(`Unknown session: ${sessionId}`);
    }
    const code = await this.store.sessionLocks.run(sessionId, () => this.issueCode(sessionId));
    log.info({ sessionId, code }, 'Discount code issued by admin');
    return code;
  }
}
