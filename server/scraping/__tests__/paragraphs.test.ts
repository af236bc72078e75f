import { describe, expect, it } from 'vitest';
import { filterParagraphs, type ParagraphRules } from '../paragraphs';

describe('filterParagraphs', () => {
  it('stops at the first hard-stop paragraph', () => {
    const rules: ParagraphRules = { hardStop: ['request a correction'] };
    const outcome = filterParagraphs(['First.', 'Second.', 'Please request a correction here.', 'Footer.'], rules);
    expect(outcome).toEqual({ kind: 'accepted', paragraphs: ['First.', 'Second.'] });
  });

  it('drops blank, exact-match and substring-match paragraphs', () => {
    const rules: ParagraphRules = { skipExact: ['vtdigger'], skip: ['reader donations'] };
    const outcome = filterParagraphs(['  ', 'VTDigger', 'Supported by reader donations.', 'Real news.'], rules);
    expect(outcome).toEqual({ kind: 'accepted', paragraphs: ['Real news.'] });
  });

  it('drops a paragraph only when every phrase of a group appears', () => {
    const rules: ParagraphRules = { skipAll: [['copyright', 'wcax']] };
    const outcome = filterParagraphs(['Copyright 2025 WCAX. All rights reserved.', 'Copyright law changed.'], rules);
    expect(outcome).toEqual({ kind: 'accepted', paragraphs: ['Copyright law changed.'] });
  });

  it('drops short paragraphs containing a stop word but keeps long ones', () => {
    const rules: ParagraphRules = { skipShort: { phrases: ['subscribe'], maxLength: 50 } };
    const long = 'Residents who subscribe to the town newsletter will get updates about the road project.';
    const outcome = filterParagraphs(['Subscribe now', long], rules);
    expect(outcome).toEqual({ kind: 'accepted', paragraphs: [long] });
  });

  it('rejects the article on a first-paragraph disclaimer or prefix', () => {
    const rules: ParagraphRules = {
      firstParagraph: { reject: ['commentaries are opinion pieces'], rejectPrefixes: ['Born'] },
    };
    expect(filterParagraphs(['Commentaries are opinion pieces contributed by readers.'], rules).kind).toBe('rejected');
    expect(filterParagraphs(['Born in Rutland, she taught school for 40 years.'], rules)).toEqual({
      kind: 'rejected',
      reason: 'first paragraph starts with "Born"',
    });
    expect(filterParagraphs(['News.', 'Born in Rutland.'], rules)).toEqual({
      kind: 'accepted',
      paragraphs: ['News.', 'Born in Rutland.'],
    });
  });

  it('rejects the article when any paragraph carries blocked content', () => {
    const rules: ParagraphRules = { rejectArticle: ['young writers project'] };
    expect(filterParagraphs(['Intro.', 'This piece is part of the Young Writers Project.'], rules)).toEqual({
      kind: 'rejected',
      reason: 'blocked content "young writers project"',
    });
  });
});
