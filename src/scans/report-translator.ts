import { THREAT_LEVELS } from '@common/constants/gmp';
import { ParseError } from '@common/utils/error-handler';
import { attr, child, list, text } from '@gmp/gmp-xml';
import { CvssVector, ResultDetail, ResultSummaryEntry, ScanResult, XmlNode } from '@types';

const CVSS_METRICS: (keyof CvssVector)[] = ['AV', 'AC', 'PR', 'UI', 'S', 'C', 'I', 'A'];

export interface ReportContext {
  name: string;
  targets: string[];
}

/**
 * Split a CVSS vector such as "CVSS:3.1/AV:N/AC:L/..." into its base metrics; absent metrics are "N/A"
 */
export function parseCvssVector(vector: string | undefined): CvssVector {
  const metrics = new Map<string, string>();
  for (const part of (vector ?? '').split('/')) {
    const [key, value] = part.split(':');
    if (key && value) metrics.set(key, value);
  }

  const result: CvssVector = { AV: 'N/A', AC: 'N/A', PR: 'N/A', UI: 'N/A', S: 'N/A', C: 'N/A', I: 'N/A', A: 'N/A' };
  for (const metric of CVSS_METRICS) {
    result[metric] = metrics.get(metric) ?? 'N/A';
  }
  return result;
}

/**
 * gvmd threat level for a severity score, used when a result carries no <threat>
 */
export function threatForSeverity(severity: number): string {
  if (severity >= 7) return 'High';
  if (severity >= 4) return 'Medium';
  if (severity > 0) return 'Low';
  return 'Log';
}

function translateResult(result: XmlNode, index: number): ResultDetail {
  const id = attr(result, 'id');
  const host = text(result, 'host');
  const nvt = child(result, 'nvt');
  const severity = Number(text(result, 'severity'));

  if (!id || !host || !nvt || !Number.isFinite(severity)) {
    throw new ParseError(`Report result #${index + 1} lacks an id, host, nvt or numeric severity`, {
      resultId: id,
      index,
    });
  }

  const cveRef = list(child(nvt, 'refs'), 'ref').find(ref => attr(ref, 'type') === 'cve');
  const severityVector = text(child(child(nvt, 'severities'), 'severity'), 'value');

  return {
    id,
    name: text(result, 'name') ?? 'N/A',
    host,
    port: text(result, 'port') ?? 'general',
    severity,
    threat: text(result, 'threat') ?? threatForSeverity(severity),
    description: text(result, 'description') ?? '',
    cve: attr(cveRef, 'id') ?? 'N/A',
    score: text(nvt, 'cvss_base') ?? 'N/A',
    cvss_vector: parseCvssVector(severityVector),
    creation_time: text(result, 'creation_time') ?? '',
    modification_time: text(result, 'modification_time') ?? '',
  };
}

function summarize(details: ResultDetail[]): ResultSummaryEntry[] {
  const summary: ResultSummaryEntry[] = THREAT_LEVELS.map(level => ({
    category: level,
    count: details.filter(detail => detail.threat === level).length,
  }));
  summary.push({ category: 'Total', count: details.length });
  return summary;
}

/**
 * Translate a get_reports_response element into the caller-facing result.
 * Findings keep the order of the report; the same input always yields the same output.
 */
export function translateReport(response: XmlNode, context: ReportContext): ScanResult {
  const inner = child(child(response, 'report'), 'report');
  if (!inner) {
    throw new ParseError('Report response has no <report><report> element');
  }
  if (!('results' in inner)) {
    throw new ParseError('Report has no <results> element', { reportId: attr(inner, 'id') });
  }

  const details = list(child(inner, 'results'), 'result').map(translateResult);

  return {
    scan_name: context.name,
    targets: [...context.targets],
    result_details: details,
    result_summary: summarize(details),
  };
}
