export type LayoutId = 'moderno-azul' | 'classico-serifado' | 'minimalista-grade' | 'executivo-dourado';

export type Typography = 'sans' | 'serif';
export type HeaderAlignment = 'center' | 'left';
export type AchievementMarker = 'bullet' | 'number';
export type RenderSection = 'summary' | 'experience' | 'education' | 'skills' | 'projects';

export interface LayoutFontSizes {
  readonly name: number;
  readonly heading: number;
  readonly body: number;
  readonly small: number;
}

/** Page margins in points. */
export interface LayoutMargins {
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
  readonly left: number;
}

export interface LayoutStyle {
  /** `#RRGGBB` */
  readonly accentColor: string;
  readonly textColor: string;
  readonly mutedColor: string;
  readonly typography: Typography;
  /** Two-column layouts place entry headings beside their details. */
  readonly columns: 1 | 2;
  readonly headerAlignment: HeaderAlignment;
  readonly headingRule: boolean;
  readonly achievementMarker: AchievementMarker;
  readonly bulletGlyph: string;
  readonly skillSeparator: string;
  /** Placed between role and organization, or degree and institution. */
  readonly organizationJoiner: string;
  readonly periodSeparator: string;
  readonly contactSeparator: string;
  readonly fontSizes: LayoutFontSizes;
  readonly margins: LayoutMargins;
  readonly sectionTitles: Readonly<Record<RenderSection, string>>;
  /** Shown as the end of a period when an entry is ongoing and has no end text. */
  readonly currentLabel: string;
}

export interface LayoutDefinition {
  readonly id: LayoutId;
  readonly name: string;
  readonly description: string;
  readonly tags: readonly string[];
  readonly style: LayoutStyle;
}

const BASE_FONT_SIZES: LayoutFontSizes = { name: 20, heading: 13, body: 10.5, small: 9 };
const BASE_MARGINS: LayoutMargins = { top: 54, right: 54, bottom: 54, left: 54 };

export const LAYOUT_DEFINITIONS: LayoutDefinition[] = [
  {
    id: 'moderno-azul',
    name: 'Moderno Azul',
    description: 'Layout moderno com destaques em azul escuro',
    tags: ['moderno', 'profissional'],
    style: {
      accentColor: '#1F4E79',
      textColor: '#222222',
      mutedColor: '#5F6B7A',
      typography: 'sans',
      columns: 1,
      headerAlignment: 'center',
      headingRule: true,
      achievementMarker: 'bullet',
      bulletGlyph: '•',
      skillSeparator: ', ',
      organizationJoiner: ' | ',
      periodSeparator: ' - ',
      contactSeparator: ' | ',
      fontSizes: BASE_FONT_SIZES,
      margins: BASE_MARGINS,
      sectionTitles: {
        summary: 'Resumo Profissional',
        experience: 'Experiência',
        education: 'Formação',
        skills: 'Habilidades',
        projects: 'Projetos',
      },
      currentLabel: 'Atual',
    },
  },
  {
    id: 'classico-serifado',
    name: 'Clássico Serifado',
    description: 'Layout clássico com tipografia serifada',
    tags: ['clássico', 'formal'],
    style: {
      accentColor: '#333333',
      textColor: '#111111',
      mutedColor: '#555555',
      typography: 'serif',
      columns: 1,
      headerAlignment: 'center',
      headingRule: true,
      achievementMarker: 'number',
      bulletGlyph: '•',
      skillSeparator: ' • ',
      organizationJoiner: ' - ',
      periodSeparator: ' - ',
      contactSeparator: ' | ',
      fontSizes: { ...BASE_FONT_SIZES, body: 11 },
      margins: BASE_MARGINS,
      sectionTitles: {
        summary: 'Perfil',
        experience: 'Histórico Profissional',
        education: 'Educação',
        skills: 'Competências',
        projects: 'Projetos',
      },
      currentLabel: 'Atual',
    },
  },
  {
    id: 'minimalista-grade',
    name: 'Minimalista em Grade',
    description: 'Layout minimalista em duas colunas com blocos informativos',
    tags: ['minimalista', 'criativo'],
    style: {
      accentColor: '#2E7D32',
      textColor: '#333333',
      mutedColor: '#6B6B6B',
      typography: 'sans',
      columns: 2,
      headerAlignment: 'left',
      headingRule: false,
      achievementMarker: 'bullet',
      bulletGlyph: '-',
      skillSeparator: ', ',
      organizationJoiner: ' @ ',
      periodSeparator: ' - ',
      contactSeparator: ' | ',
      fontSizes: BASE_FONT_SIZES,
      margins: { ...BASE_MARGINS, left: 36, right: 36 },
      sectionTitles: {
        summary: 'Sobre',
        experience: 'Experiência',
        education: 'Formação',
        skills: 'Competências',
        projects: 'Projetos',
      },
      currentLabel: 'Atual',
    },
  },
  {
    id: 'executivo-dourado',
    name: 'Executivo Dourado',
    description: 'Layout sofisticado com destaques em dourado e foco em resultados',
    tags: ['executivo', 'premium'],
    style: {
      accentColor: '#A57C00',
      textColor: '#1C1C1C',
      mutedColor: '#6E6250',
      typography: 'sans',
      columns: 1,
      headerAlignment: 'center',
      headingRule: true,
      achievementMarker: 'bullet',
      bulletGlyph: '•',
      skillSeparator: ' | ',
      organizationJoiner: ' • ',
      periodSeparator: ' - ',
      contactSeparator: ' | ',
      fontSizes: { name: 22, heading: 14, body: 12, small: 10 },
      margins: { ...BASE_MARGINS, top: 36, bottom: 36 },
      sectionTitles: {
        summary: 'Resumo Executivo',
        experience: 'Trajetória Profissional',
        education: 'Formação Acadêmica',
        skills: 'Áreas de Expertise',
        projects: 'Resultados Relevantes',
      },
      currentLabel: 'Atual',
    },
  },
];
