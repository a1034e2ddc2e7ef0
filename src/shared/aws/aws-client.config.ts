import { AppConfig } from '../../config/configuration';

export interface AwsClientConfig {
  region: string;
  endpoint?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
}

/**
 * Region, credentials and optional endpoint override (LocalStack) shared by
 * every SDK client the service creates.
 */
export function awsClientConfig(aws: AppConfig['aws']): AwsClientConfig {
  return {
    region: aws.region,
    ...(aws.endpoint && { endpoint: aws.endpoint }),
    ...(aws.credentials && { credentials: aws.credentials }),
  };
}
