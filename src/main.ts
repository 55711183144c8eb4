import { Actor, log } from 'apify';

import { parseInput, redactInput } from './config.js';
import { RUN_REPORT_KEY } from './constants.js';
import { ConfigInvalidError, errorMessage } from './errors.js';
import { OpenAiLlmClient } from './llm/openai.js';
import { runSearch, toDatasetItems } from './run.js';
import { AirbnbClient } from './scrapers/airbnb.js';

await Actor.init();

const abortController = new AbortController();

Actor.on('aborting', () => {
    // stop scheduling tiles and listings; finished work is still committed
    log.warning('Abort requested, finishing units already in flight');
    abortController.abort();
});

try {
    const settings = parseInput(await Actor.getInput());

    log.info('Starting Stay Scout', redactInput(settings));

    const proxyConfiguration = settings.proxyConfiguration
        ? await Actor.createProxyConfiguration(settings.proxyConfiguration)
        : undefined;
    const store = await Actor.openKeyValueStore(settings.storeName);

    const source = new AirbnbClient({
        apiKey: settings.airbnbApiKey,
        locale: settings.locale,
        proxyConfiguration,
        requestTimeoutMs: settings.sourceTimeoutMs,
        maxReviews: settings.analysis?.maxReviewsPerListing,
    });
    const llm =
        settings.openai && settings.analysis
            ? new OpenAiLlmClient({ ...settings.openai, timeoutMs: settings.analysis.requestTimeoutMs })
            : null;

    const output = await runSearch({ settings, source, llm, store, signal: abortController.signal });

    await Actor.pushData(toDatasetItems(output));
    await Actor.setValue(RUN_REPORT_KEY, output.report);

    log.info(`Done. Saved ${output.snapshot.listings.length} listings.`, {
        snapshot: output.report.snapshotId,
        complete: output.report.complete,
    });
    await Actor.exit();
} catch (error) {
    if (error instanceof ConfigInvalidError) {
        log.error('Invalid input', { issues: error.issues });
    } else {
        log.error('Run failed', { error: errorMessage(error) });
    }
    await Actor.fail(errorMessage(error));
}
