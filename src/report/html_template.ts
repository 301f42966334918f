/**
 * Static parts of the HTML report page: stylesheet, sort script and layout.
 * Values passed to `renderPage` must already be HTML-escaped.
 */

const STYLES = `
        * {
            box-sizing: border-box;
        }
        body {
            font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Arial, sans-serif;
            margin: 20px;
            background-color: #f5f5f5;
        }
        .container {
            max-width: 1200px;
            margin: 0 auto;
            background-color: white;
            padding: 30px;
            border-radius: 8px;
            box-shadow: 0 2px 4px rgba(0, 0, 0, 0.1);
        }
        h2 {
            color: #333;
            margin-bottom: 10px;
        }
        .stats {
            color: #666;
            margin-bottom: 20px;
            font-size: 14px;
        }
        table {
            border-collapse: collapse;
            width: 100%;
        }
        th {
            background-color: #90ee90;
            padding: 12px;
            text-align: left;
            cursor: pointer;
            user-select: none;
            font-weight: 600;
        }
        th:hover {
            background-color: #7ccd7c;
        }
        th::after {
            content: " \\21C5";
            font-size: 0.8em;
            color: #666;
            opacity: 0.5;
        }
        th.sorted-asc::after {
            content: " \\25B2";
            opacity: 1;
        }
        th.sorted-desc::after {
            content: " \\25BC";
            opacity: 1;
        }
        td {
            background-color: #f9f9f9;
            padding: 10px 12px;
            border-bottom: 1px solid #e0e0e0;
        }
        tr:hover td {
            background-color: #f0f0f0;
        }
        tr:nth-child(even) td {
            background-color: #fafafa;
        }
        tr:nth-child(even):hover td {
            background-color: #f0f0f0;
        }
        .footer {
            margin-top: 30px;
            padding-top: 20px;
            border-top: 1px solid #e0e0e0;
            color: #666;
            font-size: 14px;
        }
        @media (max-width: 768px) {
            body {
                margin: 10px;
            }
            .container {
                padding: 15px;
            }
            table {
                font-size: 14px;
            }
        }`;

// Case-insensitive, per-column; clicking the sorted column again flips direction.
const SORT_SCRIPT = `
        let currentSort = { column: -1, direction: "asc" };

        function sortTable(columnIndex) {
            const table = document.getElementById("userTable");
            const tbody = table.querySelector("tbody");
            const rows = Array.from(tbody.querySelectorAll("tr"));
            const headers = table.querySelectorAll("th");

            const direction =
                currentSort.column === columnIndex && currentSort.direction === "asc"
                    ? "desc"
                    : "asc";

            rows.sort((a, b) => {
                const aText = a.cells[columnIndex].textContent.trim().toLowerCase();
                const bText = b.cells[columnIndex].textContent.trim().toLowerCase();
                const comparison = aText.localeCompare(bText);
                return direction === "asc" ? comparison : -comparison;
            });
            rows.forEach((row) => tbody.appendChild(row));

            headers.forEach((header) => header.classList.remove("sorted-asc", "sorted-desc"));
            headers[columnIndex].classList.add("sorted-" + direction);

            currentSort = { column: columnIndex, direction: direction };
        }`;

export interface PageValues {
  title: string;
  count: number;
  rows: string;
  displayTimestamp: string;
  csvName: string;
  htmlName: string;
}

export function renderPage(values: PageValues): string {
  const { title, count, rows, displayTimestamp, csvName, htmlName } = values;
  return `<!DOCTYPE html>
<html>
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${title}</title>
    <style>${STYLES}
    </style>
</head>
<body>
    <div class="container">
        <h2>${title}</h2>
        <div class="stats">Total users: ${count}</div>
        <table id="userTable">
            <thead>
                <tr>
                    <th onclick="sortTable(0)">Organization</th>
                    <th onclick="sortTable(1)">Username</th>
                    <th onclick="sortTable(2)">Email Address</th>
                </tr>
            </thead>
            <tbody>
${rows}
            </tbody>
        </table>
        <div class="footer">
            <p><strong>Last updated:</strong> ${displayTimestamp}</p>
            <p><strong>Report files:</strong> ${csvName} / ${htmlName}</p>
        </div>
    </div>

    <script>${SORT_SCRIPT}
    </script>
</body>
</html>
`;
}
