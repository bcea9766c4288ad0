import { Document, HeadingLevel, Packer, Paragraph, Table, TableCell, TableRow, TextRun, WidthType } from 'docx';
import saveAs from 'file-saver';
import { GrantSearchResult } from '../types';
import { MISSION_STATEMENT } from './mission';
import { ResultRow, toResultRows } from './resultTableService';

const REPORT_HEADERS = ['#', 'Title', 'Sponsor', 'Amount', 'Match %', 'Feasibility', 'Why it fits', 'Deadline', 'URL'];

const rowCells = (row: ResultRow): string[] => [
  String(row.rank),
  row.title,
  row.sponsor,
  row.amount,
  row.matchPercent.toFixed(1),
  row.feasibility,
  row.why_fit,
  row.deadlineStatus === 'passed' ? `${row.deadline} (passed)` : row.deadline,
  row.url,
];

export const buildReportLines = (
  result: GrantSearchResult,
  mission: string = MISSION_STATEMENT,
  today: Date = new Date()
): string[] => {
  const lines = [
    '# Grant Matches',
    `Mission: ${mission}`,
    `Generated: ${result.trace.finishedAt}`,
  ];

  if (result.status === 'empty') {
    lines.push(
      result.reason === 'parse_error'
        ? 'No grants: the model response could not be parsed.'
        : 'No grants: the model returned an empty list.'
    );
    return lines;
  }

  toResultRows(result.grants, today).forEach(row => {
    lines.push(`${row.rank}. ${row.title} (${row.sponsor || 'Unknown sponsor'})`);
    lines.push(`- Match: ${row.matchPercent.toFixed(1)}% | Feasibility: ${row.feasibility}`);
    if (row.amount) lines.push(`- Amount: ${row.amount}`);
    if (row.why_fit) lines.push(`- Why it fits: ${row.why_fit}`);
    lines.push(`- Deadline: ${row.deadline || 'N/A'}${row.deadlineStatus === 'passed' ? ' (passed)' : ''}`);
    if (row.url) lines.push(`- ${row.url}`);
  });

  return lines;
};

const textCell = (text: string, bold = false): TableCell =>
  new TableCell({ children: [new Paragraph({ children: [new TextRun({ text, bold })] })] });

export const buildReportDocument = (result: GrantSearchResult, today: Date = new Date()): Document => {
  const [heading, ...intro] = buildReportLines(result, MISSION_STATEMENT, today).slice(0, 3);
  const children: Array<Paragraph | Table> = [
    new Paragraph({ text: heading.replace(/^#+\s*/, ''), heading: HeadingLevel.HEADING_1 }),
    ...intro.map(line => new Paragraph({ children: [new TextRun(line)], spacing: { before: 80, after: 80 } })),
  ];

  if (result.status === 'ready') {
    const rows = toResultRows(result.grants, today);
    children.push(
      new Table({
        width: { size: 100, type: WidthType.PERCENTAGE },
        rows: [
          new TableRow({ children: REPORT_HEADERS.map(header => textCell(header, true)), tableHeader: true }),
          ...rows.map(row => new TableRow({ children: rowCells(row).map(cell => textCell(cell)) })),
        ],
      })
    );
  } else {
    const [, , , notice] = buildReportLines(result, MISSION_STATEMENT, today);
    children.push(new Paragraph({ children: [new TextRun(notice)] }));
  }

  return new Document({ sections: [{ properties: {}, children }] });
};

export const downloadReportDocx = async (result: GrantSearchResult, filename: string) => {
  const blob = await Packer.toBlob(buildReportDocument(result));
  saveAs(blob, `${filename}.docx`);
};
