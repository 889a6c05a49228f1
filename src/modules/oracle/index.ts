import { Config } from '../../config';
import { EntityOracle } from '../../types';
import { EndpointOracle } from './endpoint-oracle';
import { OpenAIOracle } from './openai-oracle';
import { ConfigurationError } from '../../utils/errors';

export { EndpointOracle } from './endpoint-oracle';
export { OpenAIOracle } from './openai-oracle';
export { entityLabels, isTargetEntity } from './labels';

export function createOracle(config: Pick<Config, 'oracle' | 'scorer'>): EntityOracle {
    const { oracle, scorer } = config;

    switch (oracle.backend) {
        case 'endpoint':
            if (!oracle.endpoint_url) {
                throw new ConfigurationError('oracle.endpoint_url is required for the endpoint backend');
            }
            return new EndpointOracle({
                endpoint_url: oracle.endpoint_url,
                api_token: oracle.api_token,
                timeout_ms: oracle.timeout_ms,
            });
        case 'openai':
            return new OpenAIOracle({
                api_key: oracle.openai_api_key,
                model: oracle.model,
                target_label: scorer.target_label,
                timeout_ms: oracle.timeout_ms,
            });
    }
}
