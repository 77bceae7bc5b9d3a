import test from 'ava';

import {Level, Logger, parseLevel} from '../logger';

function capture(level: Level): [Logger, string[]] {
  const lines: string[] = [];
  return [new Logger(level, line => lines.push(line), false), lines];
}

test('logger: messages below the level should be dropped', t => {
  const [logger, lines] = capture(Level.warning);
  logger.debug('hidden');
  logger.info('hidden');
  logger.warning('kept');
  logger.critical('also kept');
  t.deepEqual(lines, ['[warning] kept', '[critical] also kept']);
});

test('logger: extra parameters should be joined with spaces', t => {
  const [logger, lines] = capture(Level.notset);
  logger.debug('pages', 3, true);
  t.deepEqual(lines, ['[debug] pages 3 true']);
});

test('logger: parseLevel should accept level names in any case', t => {
  t.is(parseLevel('debug'), Level.debug);
  t.is(parseLevel('WARNING'), Level.warning);
  t.throws(() => parseLevel('verbose'), {message: 'Unknown log level "verbose"; expected one of notset, debug, info, warning, error, critical'});
});
