import { auditHtml, decodeEntities } from './render-audit';

describe('auditHtml', () => {
  it('passes ordinary newsletter markup', () => {
    const report = auditHtml(
      '<table><tr><td><a href="https://media.test/?a=1&amp;b=2"><img src="https://image.test/p.jpg" alt="Heat"></a></td></tr></table>' +
        '<a href="mailto:news@example.com">Unsubscribe</a><a href="#top">Top</a>',
    );
    expect(report).toEqual({ passed: true, findings: [] });
  });

  it('flags forbidden tags', () => {
    const report = auditHtml('<p>hi</p><iframe src="https://x.test"></iframe><SCRIPT>x()</SCRIPT>');
    expect(report.passed).toBe(false);
    expect(report.findings.filter((f) => f.rule === 'forbidden-tag').map((f) => f.excerpt)).toEqual([
      '<iframe src="https://x.test">',
      '</iframe>',
      '<SCRIPT>',
      '</SCRIPT>',
    ]);
  });

  it('flags inline event handlers', () => {
    const report = auditHtml('<img src="https://x.test/a.png" onerror="alert(1)">');
    expect(report.findings).toEqual([
      { rule: 'inline-handler', excerpt: '<img src="https://x.test/a.png" onerror="alert(1)">' },
    ]);
  });

  it('flags entity-obfuscated schemes in URL attributes', () => {
    const report = auditHtml('<a href="&#106;avascript&colon;alert(1)">x</a>');
    expect(report.findings).toEqual([
      { rule: 'unsafe-url', excerpt: 'href=&#106;avascript&colon;alert(1)' },
    ]);
  });

  it('flags data and vbscript URLs', () => {
    const report = auditHtml(`<img src='data:image/svg+xml;base64,AAAA'><a href=vbscript:msgbox>x</a>`);
    expect(report.findings.map((f) => f.rule)).toEqual(['unsafe-url', 'unsafe-url']);
  });

  it('flags javascript: anywhere in the document', () => {
    const report = auditHtml('<p>javascript:void(0)</p>');
    expect(report.findings.map((f) => f.rule)).toEqual(['javascript-scheme']);
  });

  it('reads handler-like text inside quoted values as data', () => {
    const report = auditHtml(
      '<img src="https://image.tmdb.org/t/p/w500/onload=b.jpg" alt="x onclick=y">',
    );
    expect(report).toEqual({ passed: true, findings: [] });
  });

  it('accepts javascript: inside the query of an http(s) URL', () => {
    const report = auditHtml('<img src="https://image.test/a.jpg?ref=javascript:void">');
    expect(report).toEqual({ passed: true, findings: [] });
  });

  it('still flags javascript: in attributes that are not URLs', () => {
    const report = auditHtml('<div style="background:url(javascript:alert(1))">x</div>');
    expect(report.findings.map((f) => f.rule)).toEqual(['javascript-scheme']);
  });

  it('ignores escaped markup in text', () => {
    const report = auditHtml('<p>&lt;script&gt;alert(1)&lt;/script&gt; onerror=</p>');
    expect(report.passed).toBe(true);
  });
});

describe('decodeEntities', () => {
  it('decodes numeric and common named references', () => {
    expect(decodeEntities('&#106;&#x61;&lt;&colon;&unknown;')).toBe('ja<:&unknown;');
  });
});
