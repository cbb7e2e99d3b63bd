import { SearchEngineSite } from './searchPage';

export const googleSite: SearchEngineSite = {
  id: 'google',
  searchUrl: (domain) =>
    `https://www.google.com/search?q=${encodeURIComponent(`site:${domain}`)}&hl=en&num=10`,
  resultSelectors: ['#rso', '#search .g', '#result-stats'],
};
