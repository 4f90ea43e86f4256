import { Writable } from 'stream';
import winston from 'winston';
import { createAppLogger } from '../../config/logger.config';

function captureFirstLine(logger: winston.Logger): Promise<string> {
  return new Promise((resolve) => {
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        resolve(chunk.toString().trim());
        callback();
      },
    });
    logger.clear().add(new winston.transports.Stream({ stream }));
  });
}

describe('createAppLogger', () => {
  it('should write JSON with the service name in production', async () => {
    const logger = createAppLogger({ level: 'info', nodeEnv: 'production' });
    const line = captureFirstLine(logger);

    logger.info('Card saved', { player: 'Test Player' });

    expect(JSON.parse(await line)).toMatchObject({
      level: 'info',
      message: 'Card saved',
      player: 'Test Player',
      service: 'nba-card',
    });
  });

  it('should write one readable line outside production', async () => {
    const logger = createAppLogger({ level: 'info', nodeEnv: 'development', service: 'card-cli' });
    const line = captureFirstLine(logger);

    logger.warn('Slow request', { durationMs: 1200 });

    expect(await line).toMatch(/ \[card-cli\] warn: Slow request \{"durationMs":1200\}$/);
  });

  it('should be silent under test', () => {
    expect(createAppLogger({ level: 'info', nodeEnv: 'test' }).silent).toBe(true);
  });

  it('should drop entries below the configured level', () => {
    const logger = createAppLogger({ level: 'warn', nodeEnv: 'development' });

    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(logger.isLevelEnabled('error')).toBe(true);
  });
});
