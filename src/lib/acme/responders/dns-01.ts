import { dnsChallengeRecordName } from '../../domain/domain-set.js';
import { createLogger } from '../../logger.js';
import type { ChallengePreparation, ChallengeResponder, DnsProvider } from '../capability.js';

const log = createLogger('acme');

/**
 * DNS-01 through an external provider. The value handed in is already the
 * record content (base64url SHA-256 of the key authorization).
 */
export class DnsResponder implements ChallengeResponder {
  readonly challengeType = 'dns-01' as const;

  constructor(private readonly provider: DnsProvider) {}

  async present({ identifier, value }: ChallengePreparation): Promise<void> {
    const recordName = dnsChallengeRecordName(identifier);
    log.info('Publishing TXT %s = %s', recordName, value);
    await this.provider.publish(recordName, value);
  }

  async cleanup({ identifier, value }: ChallengePreparation): Promise<void> {
    await this.provider.remove(dnsChallengeRecordName(identifier), value);
  }

  async close(): Promise<void> {
    // records are removed per challenge
  }
}
