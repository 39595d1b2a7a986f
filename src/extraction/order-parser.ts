import type { ProvenanceTracker } from '../diagnostics/provenance';
import { ExtractedCase, emptyWard } from '../types';
import { captionNameCandidates, chooseBestName } from './name-utils';
import { extractCauseNumber, extractOrderDate } from './normalizers';

/**
 * Parse normalized court ORDER text: cause number, signed (appointment) date and
 * the ward name from the caption.
 */
export function parseOrder(text: string, tracker: ProvenanceTracker): ExtractedCase {
  const ward = emptyWard();

  const name = chooseBestName(captionNameCandidates(text));
  if (name.first && name.last) {
    ward.first = name.first;
    ward.middle = name.middle;
    ward.last = name.last;
    tracker.extracted('wardFirst', { anchorLabel: 'caption' });
    tracker.extracted('wardLast', { anchorLabel: 'caption' });
    if (name.middle) tracker.extracted('wardMiddle', { anchorLabel: 'caption' });
  } else {
    tracker.missing('wardFirst', 'LABEL_NOT_FOUND', 'no guardianship caption');
    tracker.missing('wardLast', 'LABEL_NOT_FOUND', 'no guardianship caption');
  }

  const dateAppointed = extractOrderDate(text);
  if (dateAppointed) {
    tracker.extracted('dateAppointed', { anchorLabel: 'Signed' });
  } else {
    tracker.missing('dateAppointed', 'LABEL_NOT_FOUND', 'no signed date');
  }

  return {
    documentKind: 'order',
    causeNumber: extractCauseNumber(text),
    ward,
    primaryGuardian: null,
    secondaryGuardian: null,
    dateArpFiled: '',
    dateAppointed,
  };
}
