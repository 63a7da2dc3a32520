import { CONFIG_SECTION, parseConfiguration, readConfiguration } from './config';
import { HighlightError, HighlightErrorCode, isHighlightError } from './errors';
import { HighlightDriver } from './highlighting';
import { Disposable, HighlightDocument, HighlightHost } from './host';
import { Logger, logger as defaultLogger } from './logger';
import { HighlighterConfig } from './types';

interface EnabledDocument {
    document: HighlightDocument;
    driver: HighlightDriver;
    /** Redraw hook registration */
    subscription: Disposable;
}

/**
 * Wires highlight drivers into a host: one driver per enabled document,
 * registered on the host's redraw hook and refreshed on configuration changes.
 */
export class CsvColumnHighlighter implements Disposable {
    private enabled: Map<string, EnabledDocument> = new Map();
    private config: HighlighterConfig;
    private configSubscription: Disposable;

    constructor(
        private readonly host: HighlightHost,
        private readonly logger: Logger = defaultLogger
    ) {
        this.config = this.loadConfiguration() ?? parseConfiguration({});
        this.configSubscription = host.onDidChangeConfiguration(() => this.onConfigurationChanged());
    }

    get configuration(): HighlighterConfig {
        return this.config;
    }

    isEnabled(document: HighlightDocument): boolean {
        return this.enabled.has(document.uri);
    }

    /**
     * Start highlighting a document. Small documents are painted in full right
     * away; larger ones wait for the host to report dirty regions.
     */
    enable(document: HighlightDocument): HighlightDriver {
        const existing = this.enabled.get(document.uri);
        if (existing) {
            return existing.driver;
        }

        const driver = new HighlightDriver(
            document,
            this.host.getAnnotationStore(document),
            this.host.styles,
            this.config,
            { logger: this.logger }
        );
        const subscription = this.host.onRegionDirty(document, region => driver.onRegionDirty(region));
        this.enabled.set(document.uri, { document, driver, subscription });

        const maxLines = this.config.maxLinesForWholeFile;
        if (maxLines > 0 && document.lineCount <= maxLines) {
            driver.applyHighlights(0, document.length);
        }

        this.logger.info({ uri: document.uri, lines: document.lineCount }, 'column highlighting enabled');
        return driver;
    }

    /**
     * Stop highlighting a document and remove its annotations.
     * Returns false when it was not enabled.
     */
    disable(document: HighlightDocument): boolean {
        const entry = this.enabled.get(document.uri);
        if (!entry) {
            return false;
        }
        this.enabled.delete(document.uri);
        entry.subscription.dispose();
        entry.driver.dispose();
        this.logger.info({ uri: document.uri }, 'column highlighting disabled');
        return true;
    }

    /**
     * Returns true when the document ends up enabled
     */
    toggle(document: HighlightDocument): boolean {
        if (this.isEnabled(document)) {
            this.disable(document);
            return false;
        }
        this.enable(document);
        return true;
    }

    getDriver(document: HighlightDocument): HighlightDriver {
        const entry = this.enabled.get(document.uri);
        if (!entry) {
            throw new HighlightError(
                HighlightErrorCode.DOCUMENT_NOT_ENABLED,
                `Column highlighting is not enabled for ${document.uri}`,
                { uri: document.uri }
            );
        }
        return entry.driver;
    }

    /**
     * Re-read settings and recolor every enabled document.
     * Invalid settings are logged and the previous configuration is kept.
     */
    onConfigurationChanged(): void {
        const config = this.loadConfiguration();
        if (!config) {
            return;
        }
        this.config = config;
        this.enabled.forEach(({ driver }) => driver.refresh(config));
    }

    dispose(): void {
        this.enabled.forEach(({ document }) => this.disable(document));
        this.configSubscription.dispose();
    }

    private loadConfiguration(): HighlighterConfig | undefined {
        try {
            return readConfiguration(this.host.getConfiguration(CONFIG_SECTION));
        } catch (err) {
            if (isHighlightError(err)) {
                this.logger.error({ err, issues: err.details?.issues }, 'ignoring invalid configuration');
                return undefined;
            }
            throw err;
        }
    }
}

export function activate(host: HighlightHost, logger?: Logger): CsvColumnHighlighter {
    return new CsvColumnHighlighter(host, logger);
}

export function deactivate(highlighter: CsvColumnHighlighter): void {
    highlighter.dispose();
}
