/**
 * Generic JSON → HTML table renderer for the display page.
 *
 * One row per top-level key. Values are interpolated as-is: this is a sample
 * app rendering data from trusted first-party APIs.
 */

const TABLE_STYLE = `
            <style type="text/css">
        .tg  {border-collapse:collapse;border-spacing:0;}
        .tg td{border-color:black;border-style:solid;border-width:1px;font-family:Arial, sans-serif;font-size:14px;
        overflow:hidden;padding:10px 5px;word-break:normal;}
        .tg th{border-color:black;border-style:solid;border-width:1px;font-family:Arial, sans-serif;font-size:14px;
        font-weight:normal;overflow:hidden;padding:10px 5px;word-break:normal;}
        .tg .tg-0lax{text-align:left;vertical-align:top}
        </style>`;

export function json2table(json: Record<string, unknown>): string {
  let html = `
        <table class="tg">
        <thead>
        <tr>
            <th class="tg-0lax">key</th>
            <th class="tg-0lax">value</th>
        </tr>
        </thead>

        <tbody>`;

  for (const [key, value] of Object.entries(json)) {
    html += `
                <tr>
                    <td class="tg-0lax">${key}</td>
                    <td class="tg-0lax">${value}<br></td>
                </tr>`;
  }

  html += `
    </tbody>
    </table>
        `;

  return TABLE_STYLE + html;
}
