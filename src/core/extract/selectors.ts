// src/core/extract/selectors.ts
// Markup signatures of the studio detail pages. The css-* hashes are emitted
// by the site's styling layer and change when the site is redeployed.

export interface Selector {
  tag: string;
  classSignature: string;
}

export const SELECTORS = {
  name: { tag: 'h1', classSignature: 'MuiTypography-root MuiTypography-h1 css-qinhw0' },
  overviewContainer: { tag: 'div', classSignature: 'MuiStack-root css-sgccrm' },
  contactContainer: { tag: 'div', classSignature: 'css-1x2phcg' },
  address: { tag: 'p', classSignature: 'MuiTypography-root MuiTypography-body1 css-1619old' },
  description: { tag: 'div', classSignature: 'MuiBox-root css-0' },
  rating: { tag: 'p', classSignature: 'MuiTypography-root MuiTypography-body1 css-2g7rhg' },
  ratingFactor: { tag: 'div', classSignature: 'MuiStack-root css-95g4uk' },
  ratingFactorLabel: { tag: 'p', classSignature: 'MuiTypography-root MuiTypography-body1 css-1k55edk' },
  ratingFactorValue: { tag: 'p', classSignature: 'MuiTypography-root MuiTypography-body1 css-1y0caop' },
  amenity: { tag: 'p', classSignature: 'MuiTypography-root MuiTypography-body1 css-6ik050' },
  sale: { tag: 'p', classSignature: 'MuiTypography-root MuiTypography-body1 css-153qxhx' },
  imageContainer: { tag: 'div', classSignature: 'MuiBox-root css-1fivxf' },
};
