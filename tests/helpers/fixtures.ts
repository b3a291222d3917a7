export interface MetaboliteDocumentOptions {
  accession: string;
  superClass?: string;
  className?: string;
  subClass?: string;
  pathways?: string[];
}

/**
 * HMDB-style metabolite XML. Fields left out are omitted from the document.
 */
export function metaboliteDocument(options: MetaboliteDocumentOptions): string {
  const classification = [
    options.superClass !== undefined ? `<super_class>${options.superClass}</super_class>` : '',
    options.className !== undefined ? `<class>${options.className}</class>` : '',
    options.subClass !== undefined ? `<sub_class>${options.subClass}</sub_class>` : '',
  ].join('');

  const pathways = (options.pathways ?? [])
    .map((name) => `<pathway><name>${name}</name><smpdb_id>SMP0000001</smpdb_id></pathway>`)
    .join('');

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<metabolite>',
    `<accession>${options.accession}</accession>`,
    classification ? `<classification>${classification}</classification>` : '',
    pathways ? `<pathways>${pathways}</pathways>` : '',
    '</metabolite>',
  ].join('\n');
}

export function hmdbSearch(...ids: string[]): { metabolites: { hmdb_id: string }[] } {
  return { metabolites: ids.map((hmdb_id) => ({ hmdb_id })) };
}

export function keggFind(id: string, names: string): string {
  return `cpd:${id}\t${names}\n`;
}

export function keggEntry(id: string, name: string, brite: string[] = []): string {
  return [
    `ENTRY       ${id}                      Compound`,
    `NAME        ${name}`,
    ...brite.map((line) => `BRITE       ${line}`),
    '///',
    '',
  ].join('\n');
}

export function keggLinks(id: string, ...codes: string[]): string {
  return codes.map((code) => `cpd:${id}\tpath:${code}\n`).join('');
}
