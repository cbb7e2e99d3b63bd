import { SearchEngineSite } from './searchPage';

export const bingSite: SearchEngineSite = {
  id: 'bing',
  searchUrl: (domain) =>
    `https://www.bing.com/search?q=${encodeURIComponent(`site:${domain}`)}&setlang=en`,
  resultSelectors: ['#b_results li.b_algo', '.sb_count'],
};
