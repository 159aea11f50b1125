import { describe, expect, it } from 'vitest';
import { EmptyDocumentError } from '../../../shared/errors';
import { extractResume, extractResumeWithReport } from '../../../shared/extract/extractResume';

describe('extractResume', () => {
  it('maps a dash title, an ongoing range and a bullet onto one experience entry', () => {
    const resume = extractResume(['Experiência', 'Senior Developer — Tech Corp', 'Jan 2020 - Atual', '• Led the migration']);

    expect(resume.experience).toEqual([
      {
        role: 'Senior Developer',
        organization: 'Tech Corp',
        startDate: 'Jan 2020',
        endDate: 'Atual',
        isCurrent: true,
        achievements: ['Led the migration'],
      },
    ]);
  });

  it('keeps a bold entry title that contains a section keyword', () => {
    const { resume, report } = extractResumeWithReport([
      'Maria Silva',
      'maria@example.com',
      '',
      { text: 'Experiência', headingHint: true },
      { text: 'Gerente de Projetos — Vale', headingHint: true },
      'Jan 2020 - Atual',
      '• Entregou a plataforma',
    ]);

    expect(resume.experience).toEqual([
      {
        role: 'Gerente de Projetos',
        organization: 'Vale',
        startDate: 'Jan 2020',
        endDate: 'Atual',
        isCurrent: true,
        achievements: ['Entregou a plataforma'],
      },
    ]);
    expect(resume.projects).toEqual([]);
    expect(report.sections).toEqual(['experience']);
  });

  it('keeps an upper-case entry title that contains a section keyword', () => {
    const resume = extractResume([
      'Experiência',
      'COORDENADOR DE EDUCAÇÃO — SESI',
      '2018 - 2020',
      '• Coordenou cursos',
    ]);

    expect(resume.experience).toEqual([
      {
        role: 'COORDENADOR DE EDUCAÇÃO',
        organization: 'SESI',
        startDate: '2018',
        endDate: '2020',
        isCurrent: false,
        achievements: ['Coordenou cursos'],
      },
    ]);
    expect(resume.education).toEqual([]);
  });

  it('reports skill category labels as unmapped', () => {
    const { resume, report } = extractResumeWithReport(['Habilidades', 'Linguagens: TypeScript, Go', 'Docker']);
    expect(resume.skills).toEqual(['TypeScript', 'Go', 'Docker']);
    expect(report.unmapped).toEqual(['Linguagens']);
  });

  it('reads a lone email line as exactly that email', () => {
    const resume = extractResume(['maria@example.com']);
    expect(resume.contact).toEqual({ fullName: '', email: 'maria@example.com' });
    expect(resume.summary).toBe('');
  });

  it('fails on input without text', () => {
    expect(() => extractResume([])).toThrow(EmptyDocumentError);
    expect(() => extractResume(['', '   '])).toThrow(EmptyDocumentError);
  });

  it('never throws on nonsense lines', () => {
    const lines = ['asdf qwer', '%%% ###', '12345', '• • •', '----'];
    expect(() => extractResume(lines)).not.toThrow();
    const resume = extractResume(lines);
    expect(resume.experience).toEqual([]);
    expect(resume.education).toEqual([]);
    expect(resume.skills).toEqual([]);
  });

  it('extracts a complete resume with a report', () => {
    const { resume, report } = extractResumeWithReport([
      'Maria Silva',
      'maria@example.com | (11) 91234-5678 | São Paulo, SP',
      'Desenvolvedora backend com 8 anos de experiência.',
      '',
      'EXPERIÊNCIA',
      'Senior Developer — Tech Corp',
      'Jan 2020 - Atual',
      '• Led the migration',
      '',
      'FORMAÇÃO',
      'Bacharelado em Ciência da Computação - USP',
      '2012 - 2016',
      '',
      'HABILIDADES',
      'TypeScript, Node.js, PostgreSQL',
      '',
      'IDIOMAS',
      'Inglês fluente',
    ]);

    expect(resume).toEqual({
      contact: {
        fullName: 'Maria Silva',
        email: 'maria@example.com',
        phone: '(11) 91234-5678',
        location: 'São Paulo, SP',
      },
      summary: 'Desenvolvedora backend com 8 anos de experiência.',
      experience: [
        {
          role: 'Senior Developer',
          organization: 'Tech Corp',
          startDate: 'Jan 2020',
          endDate: 'Atual',
          isCurrent: true,
          achievements: ['Led the migration'],
        },
      ],
      education: [{ degree: 'Bacharelado em Ciência da Computação', institution: 'USP', details: '2012 - 2016' }],
      skills: ['TypeScript', 'Node.js', 'PostgreSQL'],
      projects: [],
    });
    expect(report).toEqual({
      needsReview: true,
      missing: [],
      unmapped: ['Inglês fluente'],
      sections: ['experience', 'education', 'skills', 'other'],
    });
  });

  it('lists missing key fields', () => {
    const { report } = extractResumeWithReport(['Skills', 'SQL']);
    expect(report.missing).toEqual(['fullName', 'email', 'phone', 'summary', 'experience', 'education']);
    expect(report.needsReview).toBe(true);
  });
});
