import type { SiemConfig } from '../config/auditConfig.js';
import { DatadogLogsSink } from './datadog.js';
import { ElasticsearchSink } from './elasticsearch.js';
import { SplunkHecSink } from './splunk.js';
import { defaultFetch } from './siemSink.js';
import type { HttpFetch, SiemSink } from './siemSink.js';

export function createSiemSink(config: SiemConfig, fetchImpl: HttpFetch = defaultFetch): SiemSink {
    switch (config.platform) {
        case 'splunk':
            return new SplunkHecSink({ hecUrl: config.splunk.hecUrl, hecToken: config.splunk.hecToken }, fetchImpl);
        case 'elasticsearch':
            return new ElasticsearchSink(config.elasticsearch, fetchImpl);
        case 'datadog':
            return new DatadogLogsSink(config.datadog, fetchImpl);
    }
}

export * from './siemSink.js';
export { SplunkHecSink } from './splunk.js';
export { ElasticsearchSink } from './elasticsearch.js';
export { DatadogLogsSink } from './datadog.js';
export { MemorySiemSink } from './memorySink.js';
