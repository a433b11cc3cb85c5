import { $ObjectsMap } from './$objects-map';
import { ArchiveDecoder } from './archive-decoder';
import { MalformedError } from './errors/malformed';
import { UnsupportedArchiveError } from './errors/unsupported-archive';
import { isArchivedMapping, isSequence } from './guards';
import { resolveUnarchiveOptions, type UnarchiveOptions } from './options';
import type { ArchivedMapping, ArchivedValue } from './types/archive-types';
import type { UnarchivedRoots } from './types/decoded-value';

export const supportedArchiver = 'NSKeyedArchiver';
export const supportedVersion = 100000;

function isSupportedVersion(version: ArchivedValue) {
  return version === supportedVersion || version === BigInt(supportedVersion);
}

/**
 * Decodes a parsed NSKeyedArchiver plist into plain values, one per `$top` entry.
 *
 * `from` is the property list as any plist parser returns it: references may be
 * `Uid` instances or `{ "CF$UID": n }` mappings. Throws an `UnarchiveError` subclass
 * on the first structural problem; there is no partial result.
 */
export function unarchive(from: ArchivedMapping, options?: UnarchiveOptions): UnarchivedRoots {
  const { $archiver, $version } = from;
  if ($archiver !== supportedArchiver || !isSupportedVersion($version)) {
    throw new UnsupportedArchiveError($archiver, $version);
  }

  const resolved = resolveUnarchiveOptions(options);
  const { logger } = resolved;

  const $objects: ArchivedValue = from.$objects ?? [];
  if (!isSequence($objects)) {
    throw new MalformedError('$objects', 'array', $objects);
  }
  const $top: ArchivedValue = from.$top ?? {};
  if (!isArchivedMapping($top)) {
    throw new MalformedError('$top', 'mapping', $top);
  }

  const decoder = new ArchiveDecoder(new $ObjectsMap($objects), resolved);
  logger.debug('DBG: unarchiving %s roots from %s objects', Object.keys($top).length, $objects.length);

  return Object.fromEntries(
    Object.entries($top).map(([name, value]) => {
      logger.group('root %s', name);
      try {
        return [name, decoder.decodeValue(value, undefined)] as const;
      } finally {
        logger.groupEnd();
      }
    }),
  );
}
