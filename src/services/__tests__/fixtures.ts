// Trimmed-down copies of the GitHub pages the scrapers read

export const cell = (date: string, id: string, level?: number) =>
  `<td tabindex="0" data-date="${date}" id="${id}"` +
  (level === undefined ? '' : ` data-level="${level}"`) +
  ` class="ContributionCalendar-day"></td>`;

export const tooltip = (id: string, text: string) =>
  `<tool-tip for="${id}" popover="manual">${text}</tool-tip>`;

export const calendar = (cells: string[], tooltips: string[]) =>
  `<table><tbody><tr>${cells.join('')}</tr></tbody></table>${tooltips.join('')}`;

export const PROFILE_PAGE = `
  <nav>
    <a href="/octocat?tab=repositories">Repositories <span class="Counter">8</span></a>
    <a href="/octocat?tab=stars">Stars <span class="Counter">120</span></a>
  </nav>
  <div class="flex-order-1">
    <a class="Link--secondary" href="https://github.com/octocat?tab=followers">
      <span class="text-bold color-fg-default">1.2k</span> followers
    </a>
    <a class="Link--secondary" href="https://github.com/octocat?tab=following">
      <span class="text-bold color-fg-default">9</span> following
    </a>
  </div>
  <div class="js-yearly-contributions">
    <div>
      <h2 class="f4 text-normal mb-2">
        1,234 contributions
        in the last year
      </h2>
    </div>
  </div>
`;

export const REPOSITORIES_PAGE = `
  <ul>
    <li class="col-12 d-flex flex-justify-between width-full py-4 border-bottom color-border-muted public source" itemprop="owns">
      <h3><a href="/octocat/Hello-World" itemprop="name codeRepository">
        Hello-World</a></h3>
      <p class="col-9 d-inline-block color-fg-muted mb-2 pr-4" itemprop="description">
        My first repository
      </p>
      <span itemprop="programmingLanguage">TypeScript</span>
    </li>
    <li class="col-12 d-flex width-full py-4 border-bottom color-border-muted public source">
      <h3><a href="/octocat/dotfiles" itemprop="name codeRepository">dotfiles</a></h3>
    </li>
    <li class="col-12 d-flex width-full py-4 border-bottom color-border-muted public fork">
      <h3><a href="/octocat/linguist" itemprop="name codeRepository">linguist</a></h3>
    </li>
    <li class="col-12 d-flex width-full py-4 border-bottom color-border-muted public source">
      <p itemprop="description">No link here</p>
    </li>
  </ul>
`;
