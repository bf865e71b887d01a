import { PipelineLogger, createLogger } from '../logger';

describe('PipelineLogger', () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should prefix enabled categories', () => {
    const logger = new PipelineLogger({ enableCheckpointLogs: true, enableTestMode: false });

    logger.checkpoint('flushed 2 checkpoints', { pending: 1 });

    expect(logSpy).toHaveBeenCalledWith('[CHECKPOINT] flushed 2 checkpoints', { pending: 1 });
  });

  it('should skip disabled categories', () => {
    const logger = new PipelineLogger({ enableCheckpointLogs: true, enableTestMode: false });

    logger.stream('batch persisted');
    logger.sync('run created');

    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should log errors whatever the categories', () => {
    const logger = createLogger({ enableTestMode: false });

    logger.error('flush failed');

    expect(errorSpy).toHaveBeenCalledWith('[ERROR] flush failed');
  });

  it('should stay silent under jest unless test mode is turned off', () => {
    const logger = createLogger({ enableCheckpointLogs: true, enableStreamLogs: true });

    logger.checkpoint('added');
    logger.stream('merged');
    logger.error('failed');

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });
});
