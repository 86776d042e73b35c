// Deterministic site used whenever the model output cannot be parsed.

export const FALLBACK_INDEX = `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8"><meta name="viewport" content="width=device-width,initial-scale=1">
  <title>Auto Generated Page</title>
  <link rel="stylesheet" href="styles.css">
</head>
<body>
  <main class="centered">
    <div class="card">
      <h1>Auto Generated</h1>
      <p>This page was generated based on the brief provided.</p>
      <form id="demoForm">
        <input name="email" placeholder="Email" type="email" required/>
        <input name="password" placeholder="Password" type="password" required/>
        <button type="submit">Submit</button>
      </form>
      <button id="toggleTheme">Toggle Dark</button>
      <div id="out"></div>
    </div>
  </main>
  <script src="script.js"></script>
</body>
</html>`;

export const FALLBACK_CSS = `:root{
  --bg:#ffffff; --card:#ffffff; --text:#111; --muted:#666; --accent:#0b84ff;
}
body{background:var(--bg); color:var(--text); font-family:Arial, Helvetica, sans-serif; margin:0; min-height:100vh; display:flex; align-items:center; justify-content:center;}
.centered{width:100%; max-width:480px; padding:20px;}
.card{background:var(--card); padding:24px; border-radius:12px; box-shadow:0 8px 30px rgba(16,24,40,0.08);}
input{display:block; width:100%; padding:10px; margin-bottom:10px; border-radius:8px; border:1px solid #ddd;}
button{background:var(--accent); color:white; border:0; padding:10px 14px; border-radius:8px;}
[data-theme='dark']{ --bg:#0b0d11; --card:#0f1114; --text:#e6eef8; --muted:#9aa8bb; --accent:#4ea3ff;}
`;

export const FALLBACK_JS = `document.getElementById('demoForm').addEventListener('submit', function(e){
  e.preventDefault();
  const fd = new FormData(e.target);
  const out = {email: fd.get('email'), password: fd.get('password')};
  document.getElementById('out').innerText = 'Demo submit: ' + JSON.stringify(out);
});
document.getElementById('toggleTheme').addEventListener('click', function(){
  const cur = document.documentElement.getAttribute('data-theme') || 'light';
  document.documentElement.setAttribute('data-theme', cur === 'dark' ? 'light' : 'dark');
});
`;

export function mitLicense(year: number, holder: string): string {
  return `MIT License

Copyright (c) ${year} ${holder}

Permission is hereby granted, free of charge, to any person obtaining a copy
of this software and associated documentation files (the "Software"), to deal
in the Software without restriction, including without limitation the rights
to use, copy, modify, merge, publish, distribute, sublicense, and/or sell
copies of the Software, and to permit persons to whom the Software is
furnished to do so, subject to the following conditions:

The above copyright notice and this permission notice shall be included in all
copies or substantial portions of the Software.

THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR
IMPLIED, INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY,
FITNESS FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE
AUTHORS OR COPYRIGHT HOLDERS BE LIABLE FOR ANY CLAIM, DAMAGES OR OTHER
LIABILITY, WHETHER IN AN ACTION OF CONTRACT, TORT OR OTHERWISE, ARISING FROM,
OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE USE OR OTHER DEALINGS IN THE
SOFTWARE.
`;
}
