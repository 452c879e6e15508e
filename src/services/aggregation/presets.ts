import { AggregatorConfig } from './types';

export const DESIGN_REVIEW_AGENTS = ['visual', 'ux', 'market', 'conversion', 'brand'] as const;

export type DesignReviewAgent = (typeof DESIGN_REVIEW_AGENTS)[number];

/** Five equally weighted design review agents. */
export const DESIGN_REVIEW_CONFIG: AggregatorConfig = {
  weights: {
    visual: 0.2,
    ux: 0.2,
    market: 0.2,
    conversion: 0.2,
    brand: 0.2,
  },
  sections: [
    { report: 'visual', section: 'color_analysis', cap: 3, priority: 'high', source: 'Visual - Color' },
    { report: 'visual', section: 'layout_analysis', cap: 2, priority: 'medium', source: 'Visual - Layout' },
    { report: 'visual', section: 'typography', cap: 2, priority: 'medium', source: 'Visual - Typography' },
    { report: 'ux', section: 'usability', cap: 3, priority: 'high', source: 'UX - Usability' },
    { report: 'ux', section: 'accessibility', cap: 2, priority: 'critical', source: 'UX - Accessibility' },
    {
      report: 'market',
      section: 'platform_optimization',
      cap: 2,
      priority: 'high',
      source: 'Market - Platform',
    },
    {
      report: 'market',
      section: 'engagement_prediction',
      listKey: 'optimization_tips',
      cap: 3,
      priority: 'medium',
      source: 'Market - Engagement',
    },
    { report: 'conversion', section: 'cta', cap: 3, priority: 'high', source: 'Conversion - CTA' },
    { report: 'conversion', section: 'copy', cap: 2, priority: 'medium', source: 'Conversion - Copy' },
    {
      report: 'conversion',
      section: 'funnel_fit',
      cap: 2,
      priority: 'medium',
      source: 'Conversion - Funnel',
    },
    { report: 'brand', section: 'logo_usage', cap: 2, priority: 'high', source: 'Brand - Logo' },
    {
      report: 'brand',
      section: 'palette_alignment',
      cap: 2,
      priority: 'medium',
      source: 'Brand - Palette',
    },
    {
      report: 'brand',
      section: 'typography_alignment',
      cap: 2,
      priority: 'medium',
      source: 'Brand - Typography',
    },
    { report: 'brand', section: 'tone_voice', cap: 2, priority: 'medium', source: 'Brand - Tone' },
  ],
  maxRecommendations: 10,
};
