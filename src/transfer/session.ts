import { resolve } from 'path';
import { ControlChannel, LatestValueChannel } from './control.js';
import { DestinationRegistry, inferFileName, sharedDestinations } from './destination.js';
import { TransferError } from './errors.js';
import { crossBoundary, TransferLoop } from './loop.js';
import { ProgressTracker } from './progress.js';
import { ResumeNegotiator } from './resume.js';
import { StateListener, TransferStateMachine } from './state.js';
import { Clock, Negotiation, ProgressSample, TransferOutcome, TransferRequest, TransferState } from './types.js';
import type { ProbeResult, ReachabilityProbe, StreamingFetch } from '../http/types.js';
import type { MediaEvent, MediaSource } from '../media/types.js';
import { MediaByteCounter } from '../media/counter.js';
import { isOutputTemplate, resolveFormatSelector } from '../media/formats.js';
import { getConfig } from '../config/index.js';
import { logger } from '../utils/logger.js';

export interface TransferDependencies {
  probe: ReachabilityProbe;
  fetcher: StreamingFetch;
  /** Required for media transfers only */
  media?: MediaSource;
  negotiator?: ResumeNegotiator;
  destinations?: DestinationRegistry;
}

export interface TransferSessionOptions {
  /** Relative destinations resolve against this directory */
  downloadsDir?: string;
  sizeLimit?: number;
  defaultQuality?: string;
  mediaTemplate?: string;
  clock?: Clock;
}

/**
 * One transfer from request to outcome. The caller drives it through
 * {@link pause}, {@link resume} and {@link cancel} and reads progress from
 * {@link progress}; everything else happens inside {@link run}.
 *
 * Sessions are single-use: create a new one to retry.
 */
export class TransferSession {
  public readonly request: Readonly<TransferRequest>;
  public readonly progress = new LatestValueChannel<ProgressSample>();

  private readonly control = new ControlChannel();
  private readonly machine = new TransferStateMachine();
  private readonly negotiator: ResumeNegotiator;
  private readonly destinations: DestinationRegistry;
  private readonly options: Required<TransferSessionOptions>;
  private outcome: Promise<TransferOutcome> | undefined;

  constructor(
    request: TransferRequest,
    private readonly deps: TransferDependencies,
    options: TransferSessionOptions = {}
  ) {
    this.request = Object.freeze({ ...request });
    this.negotiator = deps.negotiator ?? new ResumeNegotiator();
    this.destinations = deps.destinations ?? sharedDestinations;

    const config = getConfig();
    this.options = {
      downloadsDir: options.downloadsDir ?? config.paths.downloadsDir,
      sizeLimit: options.sizeLimit ?? config.transfer.maxDeclaredSize,
      defaultQuality: options.defaultQuality ?? config.media.defaultQuality,
      mediaTemplate: options.mediaTemplate ?? config.media.outputTemplate,
      clock: options.clock ?? Date.now,
    };
  }

  get state(): TransferState {
    return this.machine.current;
  }

  public onStateChange(listener: StateListener): () => void {
    return this.machine.onChange(listener);
  }

  /** The state moves at once; the worker parks at its next chunk boundary. */
  public pause(): void {
    this.control.pause();
    if (this.control.isPaused && this.machine.status === 'running') {
      this.machine.dispatch('pause');
    }
  }

  /** The worker moves the state back to running when it wakes. */
  public resume(): void {
    this.control.resume();
  }

  /** The state moves to cancelling at once; the worker halts at its next chunk boundary. */
  public cancel(): void {
    this.control.cancel();
    if (this.machine.can('cancel')) {
      this.machine.dispatch('cancel');
    }
  }

  /**
   * Runs the transfer once; later calls return the same outcome.
   */
  public run(): Promise<TransferOutcome> {
    if (!this.outcome) {
      this.outcome = this.execute();
    }
    return this.outcome;
  }

  private async execute(): Promise<TransferOutcome> {
    const { url, mode } = this.request;
    let probe: ProbeResult;
    try {
      probe = await this.deps.probe.probe(url);
    } catch (error) {
      return this.reject(TransferError.from('InputValidation', error));
    }

    const invalid = this.validate(probe);
    if (invalid) {
      return this.reject(invalid);
    }

    const destination = this.resolveDestination(probe);
    // A template names no single file until the extractor fills it in
    const exclusive = !(mode === 'media' && isOutputTemplate(destination));
    if (exclusive && !this.destinations.claim(destination)) {
      return this.reject(
        new TransferError('DestinationConflict', `Another transfer is writing ${destination}`),
        destination
      );
    }

    logger().info('Session started', { url, mode, destination, resume: this.request.resume });
    try {
      return mode === 'media'
        ? await this.runMedia(destination)
        : await this.runFile(destination, probe);
    } finally {
      if (exclusive) {
        this.destinations.release(destination);
      }
      this.progress.flush();
    }
  }

  private validate(probe: ProbeResult): TransferError | undefined {
    if (!probe.reachable) {
      return new TransferError(
        'InputValidation',
        `Invalid or inaccessible URL: ${this.request.url}${probe.reason ? ` (${probe.reason})` : ''}`
      );
    }
    if (this.request.mode === 'media') {
      return undefined;
    }
    if (probe.contentKind?.includes('text/html')) {
      return new TransferError('InputValidation', 'URL points to a webpage, not a downloadable file');
    }
    if (probe.declaredSize !== undefined && probe.declaredSize >= this.options.sizeLimit) {
      return new TransferError(
        'InputValidation',
        `File size ${probe.declaredSize} exceeds the ${this.options.sizeLimit} byte limit`
      );
    }
    return undefined;
  }

  private resolveDestination(probe: ProbeResult): string {
    const { destination, mode, url } = this.request;
    const chosen = destination !== undefined && destination !== ''
      ? destination
      : mode === 'media'
        ? this.options.mediaTemplate
        : inferFileName(url, probe.contentKind);
    return resolve(this.options.downloadsDir, chosen);
  }

  private reject(error: TransferError, filePath?: string): TransferOutcome {
    this.machine.fail(error);
    logger().error('Transfer rejected', { url: this.request.url, kind: error.kind, reason: error.message });
    return { status: 'failed', error, filePath };
  }

  private async runFile(destination: string, probe: ProbeResult): Promise<TransferOutcome> {
    let negotiation: Negotiation;
    try {
      negotiation = await this.negotiator.negotiate(destination, this.request.resume, probe.declaredSize);
    } catch (error) {
      return this.reject(TransferError.from('IOFailure', error), destination);
    }

    if (negotiation.kind === 'already-complete') {
      this.machine.dispatch('skip');
      return { status: 'completed', filePath: destination, bytes: negotiation.localSize, alreadyComplete: true };
    }

    const loop = new TransferLoop({
      url: this.request.url,
      destination,
      decision: negotiation.decision,
      fetcher: this.deps.fetcher,
      negotiator: this.negotiator,
      control: this.control,
      machine: this.machine,
      probedSize: probe.declaredSize,
      sizeLimit: this.options.sizeLimit,
      sink: sample => this.progress.publish(sample),
      clock: this.options.clock,
    });

    const result = await loop.run();
    if (result.status === 'failed') {
      return { status: 'failed', error: result.error, filePath: destination };
    }
    if (result.status === 'cancelled') {
      return { status: 'cancelled', filePath: destination, bytes: result.bytes };
    }
    return { status: 'completed', filePath: destination, bytes: result.bytes, alreadyComplete: result.alreadyComplete };
  }

  /**
   * Media transfers are driven by the source's own events. Each event is a
   * chunk boundary: pause and cancel are honored before it is applied.
   */
  private async runMedia(template: string): Promise<TransferOutcome> {
    const media = this.deps.media;
    if (!media) {
      return this.reject(new TransferError('InputValidation', 'No media source is configured'));
    }

    const { url, quality, resume } = this.request;
    const { clock } = this.options;
    const selector = resolveFormatSelector(quality, this.options.defaultQuality);

    this.machine.dispatch('start');
    const download = media.fetch(url, selector, template, { resume });
    const events = download.events[Symbol.asyncIterator]();
    const tracker = new ProgressTracker({ startedAt: clock(), totalPolicy: 'estimate' });
    const counter = new MediaByteCounter();
    let filePath = template;

    try {
      for (;;) {
        let next: IteratorResult<MediaEvent>;
        try {
          next = await events.next();
        } catch (error) {
          throw TransferError.from('TransportFailure', error);
        }
        if (next.done) {
          throw new TransferError('TransportFailure', 'Media source stopped without finishing');
        }
        const event = next.value;

        if (!(await crossBoundary(this.control, this.machine, { url, bytes: tracker.bytes }))) {
          download.stop();
          await events.return?.();
          this.machine.dispatch('halt');
          logger().info('Media transfer cancelled', { url, bytes: tracker.bytes });
          return { status: 'cancelled', filePath, bytes: tracker.bytes };
        }

        filePath = event.filePath ?? filePath;
        if (event.type === 'downloading') {
          const overall = counter.add(event);
          tracker.setTotal(overall.total);
          this.progress.publish(tracker.observe(overall.bytes, clock()));
          this.machine.dispatch('chunk');
          continue;
        }

        // The final sample is normalized so bytes and total agree
        const finalBytes = Math.max(counter.finish(event.bytes), tracker.bytes);
        tracker.setTotal(finalBytes);
        this.progress.publish(tracker.observe(finalBytes, clock()));
        this.machine.dispatch('complete');
        logger().info('Media transfer completed', { url, filePath, bytes: finalBytes });
        return { status: 'completed', filePath, bytes: finalBytes, alreadyComplete: false };
      }
    } catch (error) {
      download.stop();
      const reason = TransferError.from('TransportFailure', error);
      this.machine.fail(reason);
      logger().error('Media transfer failed', { url, kind: reason.kind, error: reason });
      return { status: 'failed', error: reason, filePath };
    }
  }
}
