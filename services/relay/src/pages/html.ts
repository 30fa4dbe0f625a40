export const welcomeHtml = `<!DOCTYPE html>
<html>
  <head>
    <meta charset="utf-8">
    <link rel=icon href=data:,>
    <title>DataYoinker</title>
  </head>
  <body>
    <h1>Welcome</h1>
    <p>Welcome to DataYoinker, take a look at
      <a href="/quickstart">the quickstart guide</a>
    for usage information</p>
  </body>
</html>`;

export const quickstartHtml = `<!DOCTYPE html>
<html>
  <head>
    <meta charset="utf-8">
    <link rel=icon href=data:,>
    <title>DataYoinker Quickstart</title>
  </head>
  <body>
    <h1>Publishing data</h1>
    <h2>Publishing your data is as easy as making a GET request!</h2>
    <p>The URL is as follows:</p>
    <pre><code>/publish/yoink/for/mything?variable=value</code></pre>
    <p>An example with curl:</p>
    <pre><code>curl 'http://localhost:3333/publish/yoink/for/greenhouse?tempreading=25.7&amp;name=home'</code></pre>
    <p>And then you get back something like this:</p>
    <pre><code>{
  "id": 1,
  "topic": "greenhouse",
  "timestamp": "2026-10-18T11:21:11.042Z",
  "content": {
    "tempreading": 25.7,
    "name": "home"
  }
}</code></pre>
    <p>Numbers are stored as numbers, everything else as text. A parameter may only be given once.</p>
    <p>Prefer POST? <code>POST /yoink/greenhouse</code> takes the same parameters as a query string,
      a form body or a flat JSON object.</p>

    <h1>Retrieving data</h1>
    <h2>Retrieving your data is also as easy as making a GET request!</h2>
    <table>
      <tr><th>What</th><th>URL</th></tr>
      <tr><td>Latest yoink</td><td><code>/get/latest/yoink/from/greenhouse</code> or <code>/yoink/greenhouse</code></td></tr>
      <tr><td>Last 5 yoinks</td><td><code>/get/last/5/yoinks/from/greenhouse</code> or <code>/yoinks/greenhouse/5</code></td></tr>
      <tr><td>All yoinks</td><td><code>/get/all/yoinks/from/greenhouse</code> or <code>/yoinks/greenhouse</code></td></tr>
    </table>
    <p>Lists come back newest first. <code>/get/5/last/...</code>, <code>/get/latest/5/...</code>
      and <code>/get/5/latest/...</code> work too.</p>
  </body>
</html>`;
