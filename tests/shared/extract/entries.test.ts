import { describe, expect, it } from 'vitest';
import {
  groupEntries,
  parseEducationEntry,
  parseExperienceEntry,
  parseProjectEntry,
  splitAtSeparator,
} from '../../../shared/extract/entries';
import type { DocumentLine } from '../../../shared/types';

const lines = (...texts: string[]): DocumentLine[] => texts.map((text) => ({ text }));

describe('splitAtSeparator', () => {
  it('splits at the first separator found, in table order', () => {
    expect(splitAtSeparator('Analyst - Data | Acme', [' - ', ' | '])).toEqual(['Analyst', 'Data | Acme']);
    expect(splitAtSeparator('Analyst', [' - '])).toEqual(['Analyst', undefined]);
  });
});

describe('experience entries', () => {
  it('starts a new entry at a title line after bullets', () => {
    const entries = groupEntries(
      lines(
        'Senior Developer — Tech Corp',
        'Jan 2020 - Atual',
        '• Led the migration',
        '• Mentored two engineers',
        'Developer at Startup X',
        '03/2017 - 12/2019',
        '• Built the billing service',
      ),
      'experience',
    );

    expect(entries.map(parseExperienceEntry)).toEqual([
      {
        role: 'Senior Developer',
        organization: 'Tech Corp',
        startDate: 'Jan 2020',
        endDate: 'Atual',
        isCurrent: true,
        achievements: ['Led the migration', 'Mentored two engineers'],
      },
      {
        role: 'Developer',
        organization: 'Startup X',
        startDate: '03/2017',
        endDate: '12/2019',
        isCurrent: false,
        achievements: ['Built the billing service'],
      },
    ]);
  });

  it('moves a title line forward when a date-only line opens a second range', () => {
    const entries = groupEntries(
      lines('Analyst — Acme', '2015 - 2016', 'Handled reports', 'Consultant — Beta', '2016 - 2017'),
      'experience',
    );

    expect(entries.map(parseExperienceEntry)).toEqual([
      {
        role: 'Analyst',
        organization: 'Acme',
        startDate: '2015',
        endDate: '2016',
        isCurrent: false,
        summary: 'Handled reports',
        achievements: [],
      },
      {
        role: 'Consultant',
        organization: 'Beta',
        startDate: '2016',
        endDate: '2017',
        isCurrent: false,
        achievements: [],
      },
    ]);
  });

  it('joins wrapped bullet lines', () => {
    const [entry] = groupEntries(
      lines('Engineer — Corp', '• Designed the ingestion pipeline that', 'processes events', '• Second'),
      'experience',
    );

    expect(parseExperienceEntry(entry)).toEqual({
      role: 'Engineer',
      organization: 'Corp',
      isCurrent: false,
      achievements: ['Designed the ingestion pipeline that processes events', 'Second'],
    });
  });

  it('splits entries at blank lines', () => {
    expect(groupEntries(lines('First role', '', 'Second role'), 'experience')).toHaveLength(2);
  });
});

describe('education entries', () => {
  it('collects degree, institution and details', () => {
    const entries = groupEntries(
      lines(
        'Bacharelado em Ciência da Computação — Universidade de São Paulo',
        '2012 - 2016',
        'Iniciação científica em grafos',
        'MBA em Gestão, FGV, 2018',
      ),
      'education',
    );

    expect(entries.map(parseEducationEntry)).toEqual([
      {
        degree: 'Bacharelado em Ciência da Computação',
        institution: 'Universidade de São Paulo',
        details: '2012 - 2016; Iniciação científica em grafos',
      },
      { degree: 'MBA em Gestão', institution: 'FGV', details: '2018' },
    ]);
  });
});

describe('project entries', () => {
  it('reads the name, description and first link', () => {
    const entries = groupEntries(
      lines(
        'Agenda Viva — Conversor de agendas https://example.com/agenda',
        'Ferramenta em TypeScript.',
        '',
        'Painel: dashboards internos',
      ),
      'projects',
    );

    expect(entries.map(parseProjectEntry)).toEqual([
      {
        name: 'Agenda Viva',
        description: 'Conversor de agendas Ferramenta em TypeScript.',
        link: 'https://example.com/agenda',
      },
      { name: 'Painel', description: 'dashboards internos' },
    ]);
  });
});
