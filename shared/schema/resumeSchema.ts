const text = { type: 'string' } as const;
const textList = { type: 'array', items: { type: 'string' }, default: [] } as const;

export const RESUME_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    contact: {
      type: 'object',
      additionalProperties: false,
      default: {},
      properties: {
        fullName: { type: 'string', default: '' },
        email: text,
        phone: text,
        location: text,
        linkedin: text,
        website: text,
      },
    },
    summary: { type: 'string', default: '' },
    experience: {
      type: 'array',
      default: [],
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['role'],
        properties: {
          role: text,
          organization: text,
          startDate: text,
          endDate: text,
          isCurrent: { type: 'boolean', default: false },
          summary: text,
          achievements: textList,
        },
      },
    },
    education: {
      type: 'array',
      default: [],
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['degree'],
        properties: {
          degree: text,
          institution: text,
          details: text,
        },
      },
    },
    skills: textList,
    projects: {
      type: 'array',
      default: [],
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['name'],
        properties: {
          name: text,
          description: text,
          link: text,
        },
      },
    },
  },
} as const;
