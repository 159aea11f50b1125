import { describe, expect, it } from 'vitest';
import { getLayout } from '../../../shared/layouts/registry';
import { achievementLabel, buildContentBlocks, formatPeriod } from '../../../shared/render/blocks';
import { createEmptyResume, type Resume } from '../../../shared/types';

describe('buildContentBlocks', () => {
  it('composes display strings from the layout style', () => {
    const resume: Resume = {
      contact: { fullName: 'Maria Silva', email: 'maria@example.com', phone: '(11) 91234-5678' },
      summary: 'Resumo curto.',
      experience: [
        {
          role: 'Senior Developer',
          organization: 'Tech Corp',
          startDate: 'Jan 2020',
          isCurrent: true,
          achievements: ['Led the migration', 'Mentored'],
        },
      ],
      education: [{ degree: 'Bacharelado', institution: 'USP', details: '2012 - 2016' }],
      skills: ['TypeScript', 'SQL'],
      projects: [],
    };

    expect(buildContentBlocks(resume, getLayout('classico-serifado'))).toEqual([
      {
        type: 'contact',
        name: 'Maria Silva',
        details: ['maria@example.com', '(11) 91234-5678'],
        line: 'maria@example.com | (11) 91234-5678',
      },
      { type: 'heading', section: 'summary', title: 'Perfil' },
      { type: 'summary', text: 'Resumo curto.' },
      { type: 'heading', section: 'experience', title: 'Histórico Profissional' },
      {
        type: 'entry',
        section: 'experience',
        heading: 'Senior Developer - Tech Corp',
        period: 'Jan 2020 - Atual',
        achievements: ['1. Led the migration', '2. Mentored'],
      },
      { type: 'heading', section: 'education', title: 'Educação' },
      { type: 'entry', section: 'education', heading: 'Bacharelado - USP', details: '2012 - 2016', achievements: [] },
      { type: 'heading', section: 'skills', title: 'Competências' },
      { type: 'skills', items: ['TypeScript', 'SQL'], text: 'TypeScript • SQL' },
    ]);
  });

  it('keeps only the contact block for an empty resume', () => {
    expect(buildContentBlocks(createEmptyResume(), getLayout('moderno-azul'))).toEqual([
      { type: 'contact', name: '', details: [], line: '' },
    ]);
  });

  it('skips entries with no content', () => {
    const resume = createEmptyResume();
    resume.projects = [{ name: '  ' }];
    resume.skills = [' ', ''];
    expect(buildContentBlocks(resume, getLayout('moderno-azul')).map((block) => block.type)).toEqual(['contact']);
  });

  it('uses the projects title of the layout', () => {
    const resume = createEmptyResume();
    resume.projects = [{ name: 'Agenda Viva', link: 'https://example.com/agenda' }];
    expect(buildContentBlocks(resume, getLayout('executivo-dourado')).slice(1)).toEqual([
      { type: 'heading', section: 'projects', title: 'Resultados Relevantes' },
      {
        type: 'entry',
        section: 'projects',
        heading: 'Agenda Viva',
        link: 'https://example.com/agenda',
        achievements: [],
      },
    ]);
  });
});

describe('formatPeriod', () => {
  const { style } = getLayout('moderno-azul');

  it('shows a lone start date when the entry is not ongoing', () => {
    expect(formatPeriod({ role: 'Dev', startDate: '2019', isCurrent: false, achievements: [] }, style)).toBe('2019');
  });

  it('keeps the end text found in the document', () => {
    expect(
      formatPeriod({ role: 'Dev', startDate: '2019', endDate: 'Presente', isCurrent: true, achievements: [] }, style),
    ).toBe('2019 - Presente');
  });

  it('returns undefined without dates', () => {
    expect(formatPeriod({ role: 'Dev', isCurrent: false, achievements: [] }, style)).toBeUndefined();
  });
});

describe('achievementLabel', () => {
  it('prefixes the layout marker', () => {
    expect(achievementLabel('Shipped', 0, getLayout('moderno-azul').style)).toBe('• Shipped');
    expect(achievementLabel('Shipped', 2, getLayout('classico-serifado').style)).toBe('3. Shipped');
  });
});
