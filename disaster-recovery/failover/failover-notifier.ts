// DR Failover Notifier
// Tells operators about completed region switches over SNS

import { PublishCommand, SNSClient } from '@aws-sdk/client-sns';
import type { FailoverRecord } from '../models/contracts';

export interface FailoverNotifier {
  notify(record: FailoverRecord): Promise<void>;
}

export class SnsFailoverNotifier implements FailoverNotifier {
  constructor(
    private readonly client: SNSClient,
    private readonly topicArn: string
  ) {}

  async notify(record: FailoverRecord): Promise<void> {
    const verb = record.action === 'failover' ? 'Failover' : 'Failback';

    await this.client.send(
      new PublishCommand({
        TopicArn: this.topicArn,
        Subject: `DR ${verb} ${record.status}: ${record.sourceRegion} -> ${record.targetRegion}`,
        Message: JSON.stringify({
          action: record.action,
          source_region: record.sourceRegion,
          target_region: record.targetRegion,
          status: record.status,
          timestamp: record.timestamp.toISOString(),
        }),
        MessageAttributes: {
          action: { DataType: 'String', StringValue: record.action },
          status: { DataType: 'String', StringValue: record.status },
        },
      })
    );
  }
}
